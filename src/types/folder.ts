/**
 * Folder Types
 *
 * A folder is one unit of publishable content: the template folder or one of
 * the custom (variant) folders.
 */

/**
 * Role of a folder in a run
 */
export const FolderKind = {
  /** Baseline content; published as the main branch with independent history */
  TEMPLATE: 'template',
  /** Variant content; published as a branch of the same name */
  CUSTOM: 'custom',
} as const;

export type FolderKind = (typeof FolderKind)[keyof typeof FolderKind];

export interface Folder {
  /** Folder name, also the branch name */
  name: string;
  /** Absolute filesystem path */
  path: string;
  kind: FolderKind;
  /** File that must exist with non-blank content (`<name>.txt`), null for the template */
  requiredFile: string | null;
}

/**
 * A file to be published, relative to the folder root (POSIX separators)
 */
export interface FileEntry {
  path: string;
  content: Buffer;
}

/**
 * How file filtering was decided for a folder
 */
export const FilterMode = {
  GITIGNORE: 'gitignore',
  EXCLUDE_NAMES: 'exclude-names',
  ALL: 'all',
} as const;

export type FilterMode = (typeof FilterMode)[keyof typeof FilterMode];

export interface CollectedFiles {
  mode: FilterMode;
  files: FileEntry[];
}

/**
 * Where a pull request body comes from
 */
export type DescriptionSource =
  | { kind: 'file'; fileName: string }
  | { kind: 'static'; text: string }
  | { kind: 'default' };
