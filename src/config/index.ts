/**
 * Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * (populated from `.env` at startup) with validation and defaults.
 */

import { z } from 'zod';
import type { DescriptionSource } from '../types/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Configuration error: a value the invoked command needs is missing or invalid.
 * Aborts the run before any folder is processed.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly variable?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Split a comma separated list, trimming entries and dropping blanks
 */
export function splitCsv(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** Treat unset and blank variables the same way */
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const csvList = z
  .string()
  .optional()
  .transform((value) => splitCsv(value));

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Repository
  repoUrl: optionalString,
  githubToken: optionalString,
  githubApiUrl: optionalString.pipe(z.string().url().optional()),

  // Folders
  mainFolderName: optionalString,
  customFolders: csvList,
  excludeNames: csvList,

  // Pull request description
  prDescriptionFile: optionalString,
  prDescription: optionalString,

  // Commit identity for the scratch repository
  gitUserName: optionalString,
  gitUserEmail: optionalString,

  // Editor chat sessions gathered by the collect command
  editorDataDir: optionalString,
  editorVariants: csvList,
});

type RawConfig = z.infer<typeof configSchema>;

export interface GitIdentity {
  name: string;
  email: string;
}

export interface VariantPublishConfig {
  repoUrl?: string;
  githubToken?: string;
  githubApiUrl?: string;
  mainFolderName?: string;
  customFolders: string[];
  excludeNames: string[];
  description: DescriptionSource;
  gitIdentity?: GitIdentity;
  /** Editor user data directory holding one directory per editor variant */
  editorDataDir?: string;
  /** Editor variants searched for chat sessions, empty for the defaults */
  editorVariants: string[];
}

/**
 * Folder layout every command needs
 */
export interface FolderConfig {
  mainFolderName: string;
  customFolders: string[];
}

/**
 * Description file wins over a static description; otherwise the generated default
 */
function toDescriptionSource(raw: RawConfig): DescriptionSource {
  if (raw.prDescriptionFile) {
    return { kind: 'file', fileName: raw.prDescriptionFile };
  }
  if (raw.prDescription) {
    return { kind: 'static', text: raw.prDescription };
  }
  return { kind: 'default' };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VariantPublishConfig {
  const raw = {
    repoUrl: env['DEFAULT_REPO_URL'],
    githubToken: env['GITHUB_TOKEN'],
    githubApiUrl: env['GITHUB_API_URL'],
    mainFolderName: env['MAIN_FOLDER_NAME'],
    customFolders: env['CUSTOM_FOLDERS'],
    excludeNames: env['EXCLUDE_NAMES'],
    prDescriptionFile: env['PR_DESCRIPTION_FILE'],
    prDescription: env['PR_DESCRIPTION'],
    gitUserName: env['VARIANT_PUBLISH_GIT_USER_NAME'],
    gitUserEmail: env['VARIANT_PUBLISH_GIT_USER_EMAIL'],
    editorDataDir: env['VSCODE_DATA_DIR'],
    editorVariants: env['VSCODE_VARIANTS'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigError(`Configuration validation failed: ${result.error.message}`);
  }

  const data = result.data;
  const config: VariantPublishConfig = {
    customFolders: data.customFolders,
    excludeNames: data.excludeNames,
    description: toDescriptionSource(data),
    editorVariants: data.editorVariants,
  };

  if (data.repoUrl) config.repoUrl = data.repoUrl;
  if (data.githubToken) config.githubToken = data.githubToken;
  if (data.githubApiUrl) config.githubApiUrl = data.githubApiUrl;
  if (data.mainFolderName) config.mainFolderName = data.mainFolderName;
  if (data.editorDataDir) config.editorDataDir = data.editorDataDir;
  if (data.gitUserName && data.gitUserEmail) {
    config.gitIdentity = { name: data.gitUserName, email: data.gitUserEmail };
  }

  log.info(
    {
      mainFolderName: config.mainFolderName,
      customFolders: config.customFolders.length,
      excludeNames: config.excludeNames.length,
      description: config.description.kind,
      hasToken: Boolean(config.githubToken),
    },
    'Configuration loaded'
  );

  return config;
}

function missing(variable: string, description: string): ConfigError {
  return new ConfigError(
    `${variable} is not configured (${description}). Set it in .env, see .env.example`,
    variable
  );
}

/**
 * Require the template folder name and the custom folder list.
 *
 * @param mainNameOverride - value of `--main-name`, wins over MAIN_FOLDER_NAME
 */
export function requireFolderConfig(
  config: VariantPublishConfig,
  mainNameOverride?: string
): FolderConfig {
  const mainFolderName = mainNameOverride?.trim() || config.mainFolderName;
  if (!mainFolderName) {
    throw missing('MAIN_FOLDER_NAME', 'template folder name');
  }
  if (config.customFolders.length === 0) {
    throw missing('CUSTOM_FOLDERS', 'comma separated custom folder names');
  }
  return { mainFolderName, customFolders: config.customFolders };
}

/**
 * Require the remote repository URL.
 *
 * @param override - value of `--repo-url`, wins over DEFAULT_REPO_URL
 */
export function requireRepoUrl(config: VariantPublishConfig, override?: string): string {
  const repoUrl = override?.trim() || config.repoUrl;
  if (!repoUrl) {
    throw missing('DEFAULT_REPO_URL', 'GitHub repository URL');
  }
  return repoUrl;
}

export function requireGitHubToken(config: VariantPublishConfig): string {
  if (!config.githubToken) {
    throw missing('GITHUB_TOKEN', 'GitHub access token');
  }
  return config.githubToken;
}

/**
 * Require the editor user data directory.
 *
 * @param override - value of `--data-dir`, wins over VSCODE_DATA_DIR
 * @param fallback - platform default, null when there is none
 */
export function requireEditorDataDir(
  config: VariantPublishConfig,
  override: string | undefined,
  fallback: string | null
): string {
  const dataDir = override?.trim() || config.editorDataDir || fallback;
  if (!dataDir) {
    throw missing('VSCODE_DATA_DIR', 'editor user data directory, APPDATA on Windows');
  }
  return dataDir;
}

/**
 * Singleton configuration instance
 */
let configInstance: VariantPublishConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): VariantPublishConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset the configuration singleton (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
