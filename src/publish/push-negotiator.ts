import type { PushResult, Snapshot } from '../types/index.js';
import { stripTokenFromUrl } from '../workspace/github.js';
import { createLogger } from '../utils/logger.js';
import type { PublishRepository } from './repository.js';

const log = createLogger('push-negotiator');

export interface NegotiationInput {
  snapshot: Snapshot;
  /** Remote tip of the branch, undefined when the branch does not exist yet */
  remoteTip: string | undefined;
  /** Change detector verdict */
  differs: boolean;
  /** Forced pushes authorized for this run */
  force: boolean;
  /** Predict the outcome without pushing */
  dryRun: boolean;
}

/**
 * Negotiation states. `done` is terminal and carries the result.
 */
type NegotiationStep =
  | { state: 'initial' }
  | { state: 'needs-force'; remoteTip: string }
  | { state: 'done'; result: PushResult };

function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return stripTokenFromUrl(message.trim());
}

/**
 * Push a snapshot: safe push first, forced push only after a
 * non-fast-forward rejection and only when forcing is authorized.
 */
export async function negotiatePush(
  repository: PublishRepository,
  input: NegotiationInput
): Promise<PushResult> {
  let step: NegotiationStep = { state: 'initial' };

  while (step.state !== 'done') {
    step = input.dryRun
      ? await predict(repository, input)
      : await advance(repository, input, step);
  }

  log.debug(
    { branch: input.snapshot.branch, status: step.result.status, dryRun: input.dryRun },
    'Push negotiated'
  );
  return step.result;
}

async function advance(
  repository: PublishRepository,
  input: NegotiationInput,
  step: Exclude<NegotiationStep, { state: 'done' }>
): Promise<NegotiationStep> {
  const { snapshot } = input;

  switch (step.state) {
    case 'initial': {
      if (!input.differs) {
        return { state: 'done', result: { status: 'skipped', reason: 'no-change' } };
      }

      try {
        const attempt = await repository.push(snapshot.branch, { force: false });
        if (attempt.accepted) {
          return { state: 'done', result: { status: 'pushed-fast-forward', commit: snapshot.commit } };
        }
        log.info({ branch: snapshot.branch, rejection: attempt.rejection }, 'Safe push rejected');
      } catch (error) {
        return { state: 'done', result: { status: 'failed', reason: errorMessage(error) } };
      }

      return { state: 'needs-force', remoteTip: input.remoteTip ?? '' };
    }

    case 'needs-force': {
      if (!input.force) {
        return {
          state: 'done',
          result: { status: 'needs-force', commit: snapshot.commit, remoteTip: step.remoteTip },
        };
      }

      try {
        const attempt = await repository.push(snapshot.branch, { force: true });
        if (attempt.accepted) {
          log.warn({ branch: snapshot.branch, replaced: step.remoteTip }, 'Remote branch overwritten');
          return { state: 'done', result: { status: 'pushed-forced', commit: snapshot.commit } };
        }
        return {
          state: 'done',
          result: { status: 'failed', reason: `forced push rejected: ${attempt.rejection}` },
        };
      } catch (error) {
        return { state: 'done', result: { status: 'failed', reason: errorMessage(error) } };
      }
    }
  }
}

/**
 * Dry run: the state the negotiation would end in, decided locally
 */
async function predict(
  repository: PublishRepository,
  input: NegotiationInput
): Promise<NegotiationStep> {
  const { snapshot, remoteTip } = input;

  if (!input.differs) {
    return { state: 'done', result: { status: 'skipped', reason: 'no-change' } };
  }

  try {
    const fastForward = !remoteTip || (await repository.isAncestor(remoteTip, snapshot.commit));
    if (fastForward) {
      return { state: 'done', result: { status: 'pushed-fast-forward', commit: snapshot.commit } };
    }
  } catch (error) {
    return { state: 'done', result: { status: 'failed', reason: errorMessage(error) } };
  }

  const tip = remoteTip ?? '';
  return {
    state: 'done',
    result: input.force
      ? { status: 'pushed-forced', commit: snapshot.commit }
      : { status: 'needs-force', commit: snapshot.commit, remoteTip: tip },
  };
}
