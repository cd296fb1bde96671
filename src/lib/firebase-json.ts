import fs from 'node:fs';
import path from 'node:path';
import { ConfigIOError, ConfigParseError } from './errors';
import {
  kBuildConfiguration,
  kDefaultConfig,
  kFlutter,
  kIos,
  kMacos,
  kPlatforms,
  kTargets,
  type ApplePlatformKey,
  type ProjectConfigurationProperty,
} from './platforms';

export const FIREBASE_JSON = 'firebase.json';

export type ConfigDocument = Record<string, unknown>;

export type ConfigNamespaces = Record<ProjectConfigurationProperty, Record<string, unknown>>;

export interface CanonicalBlock {
  [kFlutter]: {
    [kPlatforms]: Record<ApplePlatformKey, ConfigNamespaces>;
  };
}

export type ConfigureOutcome = 'created' | 'merged' | 'unchanged';

export function firebaseJsonPath(projectRoot: string): string {
  return path.join(projectRoot, FIREBASE_JSON);
}

function emptyNamespaces(): ConfigNamespaces {
  return {
    [kBuildConfiguration]: {},
    [kTargets]: {},
    [kDefaultConfig]: {},
  };
}

/**
 * The block installed under `flutter` for a project that has none. Every
 * call returns new objects.
 */
export function generateFlutterBlock(): CanonicalBlock {
  return {
    [kFlutter]: {
      [kPlatforms]: {
        [kIos]: emptyNamespaces(),
        [kMacos]: emptyNamespaces(),
      },
    },
  };
}

export function parseConfigDocument(text: string, filePath: string): ConfigDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigParseError(`${filePath} is not valid JSON`, filePath, { cause: error });
  }

  if (!isConfigDocument(parsed)) {
    throw new ConfigParseError(`${filePath} must contain a JSON object`, filePath);
  }
  return parsed;
}

export function serializeConfigDocument(document: ConfigDocument | CanonicalBlock): string {
  return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Install the `flutter` block into `<projectRoot>/firebase.json`.
 *
 * A missing file is created with the block alone. An existing file keeps all
 * of its top-level keys; the block is only added when `flutter` is absent or
 * null. A `flutter` value of any other shape is left as it is and nothing is
 * written.
 */
export function ensureConfigured(projectRoot: string): ConfigureOutcome {
  const filePath = firebaseJsonPath(projectRoot);

  if (!fs.existsSync(filePath)) {
    writeDocument(filePath, generateFlutterBlock());
    return 'created';
  }

  const document = parseConfigDocument(readDocument(filePath), filePath);
  if (document[kFlutter] !== undefined && document[kFlutter] !== null) {
    return 'unchanged';
  }

  writeDocument(filePath, { ...document, ...generateFlutterBlock() }, { existing: true });
  return 'merged';
}

export const writeFirebaseJsonFile = ensureConfigured;

function isConfigDocument(value: unknown): value is ConfigDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDocument(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigIOError('read', filePath, { cause: error });
  }
}

// Written beside the target and renamed over it; the directory is not created.
// An existing file is replaced at its real path (through symlinks) and keeps its mode.
function writeDocument(
  filePath: string,
  document: ConfigDocument | CanonicalBlock,
  opts: { existing?: boolean } = {},
): void {
  let tmp: string | undefined;
  try {
    let target = filePath;
    let mode: number | undefined;
    if (opts.existing) {
      target = fs.realpathSync(filePath);
      mode = fs.statSync(target).mode & 0o7777;
    }

    tmp = path.join(path.dirname(target), `.${path.basename(target)}.tmp.${process.pid}`);
    fs.writeFileSync(tmp, serializeConfigDocument(document), 'utf-8');
    if (mode !== undefined) {
      fs.chmodSync(tmp, mode);
    }
    fs.renameSync(tmp, target);
  } catch (error) {
    if (tmp) fs.rmSync(tmp, { force: true });
    throw new ConfigIOError('write', filePath, { cause: error });
  }
}
