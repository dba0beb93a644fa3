/**
 * Configuration types
 *
 * Locations:
 * - Project: .reforge.yaml in the working directory (or --config <path>)
 * - CLI flags override the file field by field
 */

export type Argv = string[];

/**
 * Ordered list of commands; first failure aborts the rest.
 * An unconfigured hook is an empty list.
 */
export type HookSpec = Argv[];

export const HOOK_NAMES = ['pre_build', 'post_build', 'pre_run', 'post_run', 'on_build_fail'] as const;
export type HookName = (typeof HOOK_NAMES)[number];

export type HookSpecs = Record<HookName, HookSpec>;

/**
 * Raw configuration as written in .reforge.yaml or collected from CLI flags.
 * Every field is optional; unset fields fall through to the next layer.
 */
export interface FileConfig {
  watch?: string[];
  ignore?: string[];
  include_ext?: string[];
  exclude_ext?: string[];
  debounce_ms?: number;
  grace_ms?: number;
  clear?: boolean;

  /** Explicit build argv; derived from the cargo options when omitted */
  build?: Argv;
  /** Explicit run argv; the built binary is run when omitted */
  run?: Argv;

  manifest_path?: string;
  package?: string;
  bin?: string;
  features?: string[];
  all_features?: boolean;
  no_default_features?: boolean;
  workspace?: boolean;
  release?: boolean;

  pre_build?: HookSpec;
  post_build?: HookSpec;
  pre_run?: HookSpec;
  post_run?: HookSpec;
  on_build_fail?: HookSpec;
}

/**
 * package  - cargo build; artifact path comes from cargo metadata
 * direct   - single-file compile with a known output path
 * override - explicit build argv from config/CLI
 */
export type BuildMode = 'package' | 'direct' | 'override';

export interface BuildPlan {
  readonly program: string;
  readonly args: readonly string[];
  readonly workingDir: string;
  readonly mode: BuildMode;
  /** Known artifact location (direct mode) */
  readonly outputPath?: string;
  /** Consult the artifact resolver after a successful build */
  readonly resolveArtifact: boolean;
}

export type RunSpec =
  | { readonly kind: 'command'; readonly program: string; readonly args: readonly string[] }
  | { readonly kind: 'artifact'; readonly args: readonly string[] };

export interface RunPlan {
  readonly program: string;
  readonly args: readonly string[];
  readonly cwd?: string;
}

export interface CargoSelection {
  readonly manifestPath?: string;
  readonly package?: string;
  readonly bin?: string;
  readonly release: boolean;
}

/**
 * Immutable snapshot handed to the core for one watch session
 */
export interface SessionConfig {
  readonly workingDir: string;
  readonly watch: readonly string[];
  readonly ignore: readonly string[];
  readonly includeExt: readonly string[];
  readonly excludeExt: readonly string[];
  readonly debounceMs: number;
  readonly graceMs: number;
  readonly clear: boolean;
  readonly build: BuildPlan;
  readonly run: RunSpec;
  readonly cargo: CargoSelection;
  readonly hooks: Readonly<HookSpecs>;
}

export const DEFAULT_CONFIG_FILE = '.reforge.yaml';
export const DEFAULT_DEBOUNCE_MS = 250;
export const DEFAULT_GRACE_MS = 5000;
export const DEFAULT_IGNORE = ['**/target/**', '**/.git/**'];
export const DEFAULT_INCLUDE_EXT = ['rs', 'toml'];
export const CARGO_WATCH_DEFAULTS = ['src', 'Cargo.toml', 'Cargo.lock'];

/** Files that always count as relevant changes */
export const MANIFEST_FILES = ['Cargo.toml', 'Cargo.lock'];

/** Set in the environment of every process reforge starts */
export const ACTIVE_ENV_VAR = 'REFORGE_ACTIVE';

export function emptyHooks(): HookSpecs {
  return {
    pre_build: [],
    post_build: [],
    pre_run: [],
    post_run: [],
    on_build_fail: [],
  };
}
