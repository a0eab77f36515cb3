/**
 * Shared type definitions for webmark
 */

// ============================================================================
// Bookmark Types
// ============================================================================

/**
 * A named reference to a URL. Identity is the code.
 */
export interface Bookmark {
  readonly code: string;
  readonly url: string;
  readonly description: string;
}

/** Bookmarks keyed by code, in insertion order */
export type BookmarkCollection = Map<string, Bookmark>;

// ============================================================================
// CLI Types
// ============================================================================

export const COMMANDS = ['list', 'add', 'rm', 'open'] as const;

export type CommandName = typeof COMMANDS[number];

/**
 * Parsed command-line state before defaults and environment are applied
 */
export interface CliOptionsData {
  command: CommandName | null;
  commandArgs: string[];
  force: boolean;
  help: boolean;
  storagePath: string | null;
  errors: string[];
}

/**
 * Configuration for a single invocation
 */
export interface Settings {
  command: CommandName;
  commandArgs: string[];
  force: boolean;
  /** Tilde-expanded location of the bookmarks file */
  storagePath: string;
}

// ============================================================================
// Host Capabilities
// ============================================================================

/**
 * Opens URLs in the host's default browser
 */
export interface BrowserOpener {
  open(url: string): Promise<void>;
}
