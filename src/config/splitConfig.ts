/**
 * Instrument configuration splitting.
 *
 * One YAML document configures the station, the server and the GUI. The
 * splitter separates the server-only fields and the GUI sub-document from
 * every instrument entry, and writes what is left (the residual document) to a
 * file for consumers that only accept a path.
 *
 * ```yaml
 * instruments:
 *   dmm:
 *     type: drivers.Keithley2000
 *     address: GPIB0::16::INSTR
 *     initialize: false
 *     gui:
 *       type: generic
 * ```
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { isDocument, parseDocument, stringify as stringifyYaml, type Document } from 'yaml';

import { createLogger } from '@/ui/logging/index.js';
import { AtomicFileWriter } from '@/utils/atomicFile.js';
import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import {
  DEFAULT_GUI_TYPE,
  GENERIC_GUI_ALIAS,
  GUI_FIELD,
  SERVER_FIELDS,
  defaultGuiDescriptor,
  type GuiDescriptor,
  type ServerFieldDefaults,
} from './defaults.js';
import { ConfigFormatError, ConfigNotFoundError, NullFieldError } from './errors.js';

const log = createLogger('config');

const INSTRUMENTS_FIELD = 'instruments';
const RESIDUAL_FILE_PREFIX = 'instrument-station-';

export type InstrumentSettings = Record<string, unknown>;

/**
 * Overrides for the splitter's defaults.
 */
export interface SplitConfigOptions {
  /** Server-only fields and defaults (default: SERVER_FIELDS) */
  serverFields?: ServerFieldDefaults;
  /** GUI class path for missing or "generic" GUI types (default: DEFAULT_GUI_TYPE) */
  defaultGuiType?: string;
}

/**
 * Views produced from one configuration document, keyed by instrument name.
 */
export interface SplitConfig {
  /** Server-only fields of every instrument, defaults filled in */
  serverConfig: Record<string, InstrumentSettings>;
  /** GUI descriptor of every instrument */
  guiConfig: Record<string, GuiDescriptor>;
  /** GUI descriptor + remaining fields + server fields, per instrument */
  fullConfig: Record<string, InstrumentSettings>;
  /** The document without any extracted field */
  residual: Record<string, unknown>;
}

export interface LoadedConfig extends SplitConfig {
  /**
   * Path of the residual document written as YAML. The caller owns the file
   * and removes it once its consumer has read it.
   */
  residualPath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractServerFields(
  name: string,
  settings: InstrumentSettings,
  serverFields: ServerFieldDefaults
): InstrumentSettings {
  const extracted: InstrumentSettings = {};
  for (const [field, fallback] of Object.entries(serverFields)) {
    if (!(field in settings)) {
      extracted[field] = structuredClone(fallback);
      continue;
    }
    const value = settings[field];
    delete settings[field];
    if (value === null) {
      throw new NullFieldError(name, field);
    }
    extracted[field] = value;
  }
  return extracted;
}

function extractGui(
  name: string,
  settings: InstrumentSettings,
  defaultType: string
): GuiDescriptor {
  if (!(GUI_FIELD in settings)) {
    return defaultGuiDescriptor(defaultType);
  }

  const gui = settings[GUI_FIELD];
  delete settings[GUI_FIELD];
  if (gui === null) {
    throw new NullFieldError(name, GUI_FIELD);
  }
  if (!isRecord(gui)) {
    throw new ConfigFormatError(`"${GUI_FIELD}" of instrument "${name}" must be a mapping`);
  }

  const type = gui['type'];
  if (type === undefined) {
    return { ...gui, type: defaultType };
  }
  if (type === null) {
    throw new NullFieldError(name, `${GUI_FIELD}.type`);
  }
  if (typeof type !== 'string') {
    throw new ConfigFormatError(`"${GUI_FIELD}.type" of instrument "${name}" must be a string`);
  }
  return {
    ...gui,
    type: type.toLowerCase() === GENERIC_GUI_ALIAS ? defaultType : type,
  };
}

/**
 * Split a parsed configuration document into server, GUI and full views.
 *
 * The input is left untouched; `residual` is a modified copy.
 *
 * @throws NullFieldError when a recognized field is explicitly null
 * @throws ConfigFormatError when `instruments` or an entry is not a mapping
 */
export function splitConfig(document: unknown, options: SplitConfigOptions = {}): SplitConfig {
  const serverFields = options.serverFields ?? SERVER_FIELDS;
  const defaultGuiType = options.defaultGuiType ?? DEFAULT_GUI_TYPE;

  if (!isRecord(document)) {
    throw new ConfigFormatError('configuration document must be a mapping');
  }
  const residual = structuredClone(document);
  const instruments = residual[INSTRUMENTS_FIELD];
  if (!isRecord(instruments)) {
    throw new ConfigFormatError(`missing "${INSTRUMENTS_FIELD}" mapping`);
  }

  const serverConfig: Record<string, InstrumentSettings> = {};
  const guiConfig: Record<string, GuiDescriptor> = {};
  const fullConfig: Record<string, InstrumentSettings> = {};

  for (const [name, settings] of Object.entries(instruments)) {
    if (!isRecord(settings)) {
      throw new ConfigFormatError(`instrument "${name}" must be a mapping`);
    }

    const server = extractServerFields(name, settings, serverFields);
    const gui = extractGui(name, settings, defaultGuiType);

    serverConfig[name] = server;
    guiConfig[name] = gui;
    fullConfig[name] = { [GUI_FIELD]: gui, ...structuredClone(settings), ...server };
  }

  log.debug(`Split configuration for ${Object.keys(instruments).length} instrument(s)`);
  return { serverConfig, guiConfig, fullConfig, residual };
}

async function readConfigFile(configPath: string): Promise<string> {
  try {
    return await fs.promises.readFile(configPath, 'utf-8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      throw new ConfigNotFoundError(configPath);
    }
    throw error;
  }
}

function parseConfigDocument(text: string, configPath: string): Document {
  const source = parseDocument(text);
  const [firstError] = source.errors;
  if (firstError) {
    throw new ConfigFormatError(firstError.message, configPath, firstError);
  }
  return source;
}

/**
 * Remove from the parsed source every instrument field the split extracted, so
 * the residual keeps the file's comments and layout.
 */
function pruneSource(source: Document, original: unknown, residual: Record<string, unknown>): void {
  if (!isRecord(original)) {
    return;
  }
  const originalInstruments = original[INSTRUMENTS_FIELD];
  const residualInstruments = residual[INSTRUMENTS_FIELD];
  if (!isRecord(originalInstruments) || !isRecord(residualInstruments)) {
    return;
  }

  for (const [name, settings] of Object.entries(originalInstruments)) {
    const kept = residualInstruments[name];
    if (!isRecord(settings) || !isRecord(kept)) {
      continue;
    }
    for (const field of Object.keys(settings)) {
      if (!(field in kept)) {
        source.deleteIn([INSTRUMENTS_FIELD, name, field]);
      }
    }
  }
}

/**
 * Write the residual document to a new temporary YAML file.
 *
 * A parsed YAML `Document` is written with its comments and layout; a plain
 * object is serialized from scratch.
 *
 * @returns Path of the written file
 */
export async function writeResidualConfig(
  residual: Record<string, unknown> | Document,
  directory: string = os.tmpdir()
): Promise<string> {
  const residualPath = path.join(directory, `${RESIDUAL_FILE_PREFIX}${crypto.randomUUID()}.yaml`);
  const text = isDocument(residual) ? residual.toString() : stringifyYaml(residual);
  await AtomicFileWriter.writeAsync(residualPath, text);
  log.debug(`Residual configuration written to ${residualPath}`);
  return residualPath;
}

/**
 * Load a YAML configuration file, split it, and write the residual document.
 *
 * @throws ConfigNotFoundError when the file does not exist
 * @throws ConfigFormatError when the YAML is invalid or malformed
 * @throws NullFieldError when a recognized field is explicitly null
 */
export async function loadConfig(
  configPath: string,
  options: SplitConfigOptions = {}
): Promise<LoadedConfig> {
  const text = await readConfigFile(configPath);

  const source = parseConfigDocument(text, configPath);
  let document: unknown;
  try {
    document = source.toJS();
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ConfigFormatError(getErrorMessage(error), configPath, cause);
  }

  let split: SplitConfig;
  try {
    split = splitConfig(document, options);
  } catch (error) {
    if (error instanceof ConfigFormatError && error.source === undefined) {
      throw new ConfigFormatError(error.message, configPath, error);
    }
    throw error;
  }

  pruneSource(source, document, split.residual);
  const residualPath = await writeResidualConfig(source);
  return { ...split, residualPath };
}
