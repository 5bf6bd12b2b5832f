export {
  collectArtifacts,
  DEFAULT_PROMPT_FILE,
  TIME_FILE,
  type CollectOptions,
} from './collector.js';
export {
  loadChatSession,
  loadChatSessions,
  listChatSessionFiles,
  replaySessionLog,
  setPath,
  insertPath,
} from './chat-sessions.js';
export {
  ASSISTANT_LABEL,
  exportTranscript,
  extractAssistantText,
  extractUserText,
  relativizeTranscript,
} from './transcript.js';
export { messageWindowTiming, formatLocalTimestamp, formatTimeFile } from './timing.js';
export {
  DEFAULT_EDITOR_VARIANTS,
  defaultEditorDataDir,
  findWorkspaceStorageDir,
  locateWorkspaceStorage,
  storageRoots,
  workspaceUriForFolder,
} from './workspace-storage.js';
