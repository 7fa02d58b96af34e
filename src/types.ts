/**
 * Shared types and interfaces for the gatesync CLI
 */

// ============================================================================
// Admin connection
// ============================================================================

/**
 * Where each resolved admin setting came from
 */
export type ConfigSource = 'flag' | 'env' | 'file' | 'default';

/**
 * Resolved connection settings for the gateway Admin API
 */
export interface AdminConfig {
  adminUrl: string;
  token?: string;
  workspace?: string;
  tlsSkipVerify: boolean;
  noColor: boolean;
  /** Request timeout in milliseconds */
  timeout: number;
  /** Config file that was read, when one existed */
  configPath?: string;
  sources: {
    adminUrl: ConfigSource;
    token?: ConfigSource;
    workspace?: ConfigSource;
  };
}

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Admin API URL */
  adminUrl?: string;
  /** Admin token */
  token?: string;
  /** Workspace name */
  workspace?: string;
  /** Config file path */
  config?: string;
  /** Skip TLS certificate verification */
  tlsSkipVerify: boolean;
  /** False when --no-color was given */
  color: boolean;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Don't apply changes, just show what would happen */
  dryRun: boolean;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to all command handlers
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  admin: AdminConfig;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
