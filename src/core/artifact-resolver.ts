/**
 * Artifact Resolver
 *
 * Locates the binary produced by a package-managed (cargo) build:
 * <target_directory>/<debug|release>/<bin>[.exe]
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import type { CargoSelection } from '../config/types';
import { describeError } from '../errors/reforge-error';

const execFileAsync = promisify(execFile);

export type ArtifactResolution =
  | { found: true; path: string }
  | { found: false; reason: string };

export interface IArtifactResolver {
  resolve(): Promise<ArtifactResolution>;
}

/** Returns the stdout of `cargo <args>` */
export type MetadataReader = (args: string[], cwd: string) => Promise<string>;

const readCargoMetadata: MetadataReader = async (args, cwd) => {
  const { stdout } = await execFileAsync('cargo', args, {
    cwd,
    encoding: 'utf-8',
    maxBuffer: 64 * 1024 * 1024,
  });
  return stdout;
};

export function exeName(bin: string, platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? `${bin}.exe` : bin;
}

export function exePath(
  targetDir: string,
  release: boolean,
  bin: string,
  platform: NodeJS.Platform = process.platform
): string {
  return path.join(targetDir, release ? 'release' : 'debug', exeName(bin, platform));
}

/**
 * bin, else package, else the working directory's name
 */
export function resolveBinName(selection: CargoSelection, cwd: string): string | null {
  if (selection.bin) {
    return selection.bin;
  }
  if (selection.package) {
    return selection.package;
  }
  const name = path.basename(path.resolve(cwd));
  return name === '' ? null : name;
}

export function parseTargetDirectory(metadataJson: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(metadataJson);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('target_directory' in parsed)) {
    return null;
  }
  const target = parsed.target_directory;
  return typeof target === 'string' && target !== '' ? target : null;
}

export interface CargoArtifactResolverOptions {
  cwd: string;
  selection: CargoSelection;
  readMetadata?: MetadataReader;
  platform?: NodeJS.Platform;
}

export class CargoArtifactResolver implements IArtifactResolver {
  private readonly cwd: string;
  private readonly selection: CargoSelection;
  private readonly readMetadata: MetadataReader;
  private readonly platform: NodeJS.Platform;

  constructor(options: CargoArtifactResolverOptions) {
    this.cwd = options.cwd;
    this.selection = options.selection;
    this.readMetadata = options.readMetadata ?? readCargoMetadata;
    this.platform = options.platform ?? process.platform;
  }

  async resolve(): Promise<ArtifactResolution> {
    const args = ['metadata', '--format-version', '1', '--no-deps'];
    if (this.selection.manifestPath) {
      args.push('--manifest-path', this.selection.manifestPath);
    }

    let stdout: string;
    try {
      stdout = await this.readMetadata(args, this.cwd);
    } catch (error) {
      return { found: false, reason: `cargo metadata failed: ${describeError(error)}` };
    }

    const targetDir = parseTargetDirectory(stdout);
    if (!targetDir) {
      return { found: false, reason: 'cargo metadata did not report a target_directory' };
    }

    const bin = resolveBinName(this.selection, this.cwd);
    if (!bin) {
      return { found: false, reason: 'cannot infer binary name; set bin in config or pass --bin' };
    }

    const artifact = exePath(targetDir, this.selection.release, bin, this.platform);
    if (!fs.existsSync(artifact)) {
      return { found: false, reason: `built binary not found at ${artifact}` };
    }
    return { found: true, path: artifact };
  }
}
