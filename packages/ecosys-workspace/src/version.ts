/**
 * Version Management
 *
 * Services keep their own X.Y.Z version; the repository keeps a global
 * X.Y in GLOBAL_VERSION. A patch bumps one service. A release bumps the
 * global version and aligns every service to <global>.0.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { Logger, entryKind, errorMessage, isMissingPathError, silentLogger } from 'ecosys-audit';
import { VersionError } from './errors';

export type VersionFileFormat = 'text' | 'json';

export interface ServiceVersionFile {
  service: string;
  file: string;
  format: VersionFileFormat;
}

export const SERVICE_VERSION_FILES: readonly ServiceVersionFile[] = [
  { service: 'api', file: 'api/VERSION', format: 'text' },
  { service: 'auth', file: 'auth/VERSION', format: 'text' },
  { service: 'app', file: 'app/VERSION', format: 'text' },
  { service: 'website', file: 'website/package.json', format: 'json' }
];

export const GLOBAL_VERSION_FILE = 'GLOBAL_VERSION';
export const DEFAULT_GLOBAL_VERSION = '1.0';

export type ReleaseType = 'minor' | 'major';

export const RELEASE_TYPES: readonly ReleaseType[] = ['minor', 'major'];

export function isReleaseType(value: string): value is ReleaseType {
  return (RELEASE_TYPES as readonly string[]).includes(value);
}

const PackageVersionSchema = z.object({ version: z.string() }).passthrough();

export interface ServiceBump {
  service: string;
  file: string;
  from: string;
  to: string;
}

export interface ReleaseResult {
  type: ReleaseType;
  from: string;
  to: string;
  services: ServiceBump[];
}

export function bumpPatch(version: string, source = 'version'): string {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version);
  if (!match) {
    throw new VersionError(`Could not parse version '${version}' in ${source}. Expected format X.Y.Z`, 'VERSION_UNPARSEABLE');
  }
  return `${match[1]}.${match[2]}.${Number(match[3]) + 1}`;
}

export function bumpGlobal(version: string, type: ReleaseType): string {
  const match = /^(\d+)\.(\d+)$/.exec(version);
  if (!match) {
    throw new VersionError(
      `${GLOBAL_VERSION_FILE} contains invalid format '${version}'. Expected X.Y`,
      'VERSION_UNPARSEABLE'
    );
  }
  const major = Number(match[1]);
  const minor = Number(match[2]);
  return type === 'major' ? `${major + 1}.0` : `${major}.${minor + 1}`;
}

/**
 * Service version files present under root
 */
export async function detectServices(root: string): Promise<ServiceVersionFile[]> {
  const found: ServiceVersionFile[] = [];
  for (const candidate of SERVICE_VERSION_FILES) {
    if ((await entryKind(path.join(root, candidate.file))) === 'file') {
      found.push(candidate);
    }
  }
  return found;
}

async function readPackageJson(absolute: string, file: string): Promise<z.infer<typeof PackageVersionSchema>> {
  let json: unknown;
  try {
    json = JSON.parse(await fs.readFile(absolute, 'utf-8'));
  } catch (error) {
    throw new VersionError(`Cannot read ${file}: ${errorMessage(error)}`, 'VERSION_UNREADABLE');
  }
  const parsed = PackageVersionSchema.safeParse(json);
  if (!parsed.success) {
    throw new VersionError(`${file} has no string "version" field`, 'VERSION_UNREADABLE');
  }
  return parsed.data;
}

export async function readServiceVersion(root: string, service: ServiceVersionFile): Promise<string> {
  const absolute = path.join(root, service.file);
  if (service.format === 'json') {
    return (await readPackageJson(absolute, service.file)).version;
  }
  return (await fs.readFile(absolute, 'utf-8')).trim();
}

export async function writeServiceVersion(root: string, service: ServiceVersionFile, version: string): Promise<void> {
  const absolute = path.join(root, service.file);
  if (service.format === 'json') {
    const data = await readPackageJson(absolute, service.file);
    data.version = version;
    await fs.writeFile(absolute, JSON.stringify(data, null, 4) + '\n');
    return;
  }
  await fs.writeFile(absolute, version);
}

export async function readGlobalVersion(root: string): Promise<string> {
  try {
    return (await fs.readFile(path.join(root, GLOBAL_VERSION_FILE), 'utf-8')).trim();
  } catch (error) {
    if (isMissingPathError(error)) {
      return DEFAULT_GLOBAL_VERSION;
    }
    throw error;
  }
}

export async function patchService(root: string, serviceName: string, logger: Logger = silentLogger): Promise<ServiceBump> {
  const services = await detectServices(root);
  const service = services.find((candidate) => candidate.service === serviceName);
  if (!service) {
    const available = services.length > 0 ? services.map((s) => s.service).join(', ') : '(none)';
    throw new VersionError(
      `Service '${serviceName}' not found in this repository. Available services here: ${available}`,
      'SERVICE_NOT_FOUND'
    );
  }

  const from = await readServiceVersion(root, service);
  const to = bumpPatch(from, service.file);
  logger.info(`[VERSION] Bumping PATCH for ${service.service}: ${from} -> ${to}`);
  await writeServiceVersion(root, service, to);
  logger.info(`[VERSION]   -> Updated ${service.file} to ${to}`);

  return { service: service.service, file: service.file, from, to };
}

export async function release(root: string, type: ReleaseType, logger: Logger = silentLogger): Promise<ReleaseResult> {
  const services = await detectServices(root);
  if (services.length === 0) {
    logger.warn('[VERSION] ⚠️  No standard service files (api/VERSION, website/package.json, ...) found');
  }

  const from = await readGlobalVersion(root);
  const to = bumpGlobal(from, type);
  const serviceVersion = `${to}.0`;

  // all service files are read before anything is written
  const bumps: ServiceBump[] = [];
  for (const service of services) {
    const previous = await readServiceVersion(root, service);
    bumps.push({ service: service.service, file: service.file, from: previous, to: serviceVersion });
  }

  logger.info(`[VERSION] Bumping GLOBAL (${type}): ${from} -> ${to}`);
  await fs.writeFile(path.join(root, GLOBAL_VERSION_FILE), to);

  for (const service of services) {
    await writeServiceVersion(root, service, serviceVersion);
    logger.info(`[VERSION]   -> Updated ${service.file} to ${serviceVersion}`);
  }

  return { type, from, to, services: bumps };
}
