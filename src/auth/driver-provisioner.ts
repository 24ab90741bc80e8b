import { execFile } from 'node:child_process';
import { createHash } from 'node:crypto';
import { chmodSync, existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { promisify } from 'node:util';
import AdmZip from 'adm-zip';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { configManager } from '../config/manager.js';
import { retryAsync } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { ProvisioningError } from './errors.js';
import type { DriverHandle } from './types.js';

const log = createLogger('driver-provisioner');
const execFileAsync = promisify(execFile);

const MANIFEST_FILE = 'driver.json';

const downloadEntrySchema = z.object({ platform: z.string(), url: z.string().url() });

const milestonesSchema = z.object({
  milestones: z.record(
    z.object({
      version: z.string(),
      downloads: z.object({ chromedriver: z.array(downloadEntrySchema).optional() }),
    }),
  ),
});

const cachedManifestSchema = z.object({
  version: z.string(),
  browserMajor: z.string(),
  binaryPath: z.string(),
  sha256: z.string(),
  installedAt: z.string(),
});

export type CachedDriverManifest = z.infer<typeof cachedManifestSchema>;

export interface DriverProvisionerOptions {
  cacheDir: string;
  profileDir: string;
  manifestUrl: string;
  browserBinary: string;
  maxAttempts: number;
  backoffBaseMs: number;
  /** Pinned archive SHA-256 per driver version. */
  checksums: Record<string, string>;
  platform?: string;
  http?: AxiosInstance;
}

export function loadProvisionerOptions(): DriverProvisionerOptions {
  return {
    cacheDir: configManager.get<string>('driver.cacheDir'),
    profileDir: configManager.get<string>('driver.profileDir'),
    manifestUrl: configManager.get<string>('driver.manifestUrl'),
    browserBinary: configManager.get<string>('driver.browserBinary'),
    maxAttempts: configManager.get<number>('driver.maxAttempts'),
    backoffBaseMs: configManager.get<number>('driver.backoffBaseMs'),
    checksums: configManager.get<Record<string, string>>('driver.checksums'),
  };
}

export function currentPlatform(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  if (platform === 'linux' && arch === 'x64') return 'linux64';
  if (platform === 'darwin') return arch === 'arm64' ? 'mac-arm64' : 'mac-x64';
  if (platform === 'win32') return arch === 'ia32' ? 'win32' : 'win64';
  throw new ProvisioningError(`No driver builds for ${platform}/${arch}`, 'NO_MATCHING_BUILD');
}

export function browserMajor(version: string): string {
  const major = version.trim().split('.')[0];
  if (!major || !/^\d+$/.test(major)) {
    throw new ProvisioningError(`Unrecognised browser version "${version}"`, 'BROWSER_NOT_FOUND');
  }
  return major;
}

export function sha256(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export class DriverProvisioner {
  private http: AxiosInstance;
  private resolvedPlatform: string | undefined;
  private inflight = new Map<string, Promise<DriverHandle>>();

  constructor(private opts: DriverProvisionerOptions) {
    this.http = opts.http ?? axios.create({ timeout: 120_000 });
    this.resolvedPlatform = opts.platform;
  }

  /** Resolved on first download. */
  private get platform(): string {
    if (this.resolvedPlatform === undefined) this.resolvedPlatform = currentPlatform();
    return this.resolvedPlatform;
  }

  async detectBrowserVersion(): Promise<string> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.opts.browserBinary, ['--version']));
    } catch (err) {
      throw new ProvisioningError(
        `Browser "${this.opts.browserBinary}" could not be run`,
        'BROWSER_NOT_FOUND',
        { cause: err },
      );
    }
    const match = stdout.match(/(\d+\.\d+\.\d+\.\d+)/);
    if (!match) {
      throw new ProvisioningError(
        `Could not parse browser version from "${stdout.trim()}"`,
        'BROWSER_NOT_FOUND',
      );
    }
    return match[1];
  }

  /** Returns a cached driver for the browser's major version, downloading it once when absent. */
  async ensureDriver(browserVersion: string): Promise<DriverHandle> {
    const major = browserMajor(browserVersion);

    const cached = this.readCached(major);
    if (cached) {
      log.debug({ major, version: cached.version }, 'Driver cache hit');
      return cached;
    }

    const pending = this.inflight.get(major);
    if (pending) return pending;

    const task = this.provision(major).finally(() => this.inflight.delete(major));
    this.inflight.set(major, task);
    return task;
  }

  async ensureDriverWithRetry(browserVersion: string, signal?: AbortSignal): Promise<DriverHandle> {
    return retryAsync(() => this.ensureDriver(browserVersion), {
      attempts: this.opts.maxAttempts,
      baseDelayMs: this.opts.backoffBaseMs,
      shouldRetry: (err) => err instanceof ProvisioningError && err.retryable,
      onRetry: (err, attempt, delayMs) =>
        log.warn({ attempt, delayMs, err: err.message }, 'Driver provisioning failed, retrying'),
      signal,
    });
  }

  private majorDir(major: string): string {
    return resolve(this.opts.cacheDir, major);
  }

  private toHandle(manifest: CachedDriverManifest): DriverHandle {
    return {
      binaryPath: manifest.binaryPath,
      version: manifest.version,
      browserProfileDir: resolve(this.opts.profileDir),
    };
  }

  private readCached(major: string): DriverHandle | null {
    const manifestPath = join(this.majorDir(major), MANIFEST_FILE);
    if (!existsSync(manifestPath)) return null;

    let manifest: CachedDriverManifest;
    try {
      manifest = cachedManifestSchema.parse(JSON.parse(readFileSync(manifestPath, 'utf8')));
    } catch (err) {
      log.warn({ major, err }, 'Driver manifest unreadable, re-provisioning');
      return null;
    }

    if (manifest.browserMajor !== major || !existsSync(manifest.binaryPath)) return null;
    if (sha256(readFileSync(manifest.binaryPath)) !== manifest.sha256) {
      log.warn({ major, version: manifest.version }, 'Cached driver checksum changed, re-provisioning');
      return null;
    }
    return this.toHandle(manifest);
  }

  private async provision(major: string): Promise<DriverHandle> {
    const build = await this.resolveBuild(major);
    log.info({ major, version: build.version, platform: this.platform }, 'Downloading driver');

    const archive = await this.download(build.url);
    const digest = sha256(archive);
    const pinned = this.opts.checksums[build.version];
    if (pinned && pinned.toLowerCase() !== digest) {
      throw new ProvisioningError(
        `Checksum mismatch for driver ${build.version}`,
        'CHECKSUM_MISMATCH',
      );
    }

    const manifest = this.install(major, build.version, archive);
    log.info({ major, version: build.version, path: manifest.binaryPath }, 'Driver installed');
    return this.toHandle(manifest);
  }

  private async resolveBuild(major: string): Promise<{ version: string; url: string }> {
    let data: unknown;
    try {
      const res = await this.http.get(this.opts.manifestUrl, { validateStatus: () => true });
      if (res.status < 200 || res.status >= 300) {
        throw new ProvisioningError(`Driver manifest returned ${res.status}`, 'NETWORK');
      }
      data = res.data;
    } catch (err) {
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError('Driver manifest unreachable', 'NETWORK', { cause: err });
    }

    const parsed = milestonesSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProvisioningError('Driver manifest has an unexpected shape', 'NO_MATCHING_BUILD');
    }

    const milestone = parsed.data.milestones[major];
    const entry = milestone?.downloads.chromedriver?.find((d) => d.platform === this.platform);
    if (!milestone || !entry) {
      throw new ProvisioningError(
        `No driver build for browser ${major} on ${this.platform}`,
        'NO_MATCHING_BUILD',
      );
    }
    return { version: milestone.version, url: entry.url };
  }

  private async download(url: string): Promise<Buffer> {
    try {
      const res = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
      if (res.status < 200 || res.status >= 300) {
        throw new ProvisioningError(`Driver download returned ${res.status}`, 'NETWORK');
      }
      const body = Buffer.from(res.data);
      const expectedLength = Number(res.headers['content-length']);
      if (Number.isFinite(expectedLength) && expectedLength > 0 && expectedLength !== body.length) {
        throw new ProvisioningError(
          `Driver download truncated (${body.length}/${expectedLength} bytes)`,
          'NETWORK',
        );
      }
      return body;
    } catch (err) {
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError('Driver download failed', 'NETWORK', { cause: err });
    }
  }

  private install(major: string, version: string, archive: Buffer): CachedDriverManifest {
    const dir = this.majorDir(major);
    const binaryName = this.platform.startsWith('win') ? 'chromedriver.exe' : 'chromedriver';

    let binary: Buffer;
    try {
      const entry = new AdmZip(archive)
        .getEntries()
        .find((e) => !e.isDirectory && e.entryName.split('/').pop() === binaryName);
      if (!entry) {
        throw new ProvisioningError(`Archive has no ${binaryName}`, 'NO_MATCHING_BUILD');
      }
      binary = entry.getData();
    } catch (err) {
      if (err instanceof ProvisioningError) throw err;
      throw new ProvisioningError('Driver archive is corrupt', 'INSTALL_FAILED', { cause: err });
    }

    const binaryPath = join(dir, binaryName);
    const manifest: CachedDriverManifest = {
      version,
      browserMajor: major,
      binaryPath,
      sha256: sha256(binary),
      installedAt: new Date().toISOString(),
    };

    try {
      mkdirSync(dir, { recursive: true });
      const tmpBinary = `${binaryPath}.${process.pid}.tmp`;
      writeFileSync(tmpBinary, binary);
      chmodSync(tmpBinary, 0o755);
      renameSync(tmpBinary, binaryPath);

      const manifestPath = join(dir, MANIFEST_FILE);
      const tmpManifest = `${manifestPath}.${process.pid}.tmp`;
      writeFileSync(tmpManifest, JSON.stringify(manifest, null, 2));
      renameSync(tmpManifest, manifestPath);
    } catch (err) {
      throw new ProvisioningError(`Could not install driver into ${dir}`, 'INSTALL_FAILED', {
        cause: err,
      });
    }

    return manifest;
  }
}
