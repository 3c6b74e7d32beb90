/**
 * loadConfig Contract Tests
 *
 * Reads YAML files from a temporary directory and checks the residual file.
 */

import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { parse as parseYaml } from 'yaml';

import { createTempDir, removeTempDir } from '@/__testutils__/index.js';
import {
  ConfigFormatError,
  ConfigNotFoundError,
  DEFAULT_GUI_TYPE,
  loadConfig,
  writeResidualConfig,
} from '@/config/index.js';

const STATION_YAML = `instruments:
  dmm:
    type: drivers.keithley.Keithley2000
    address: GPIB0::16::INSTR
    initialize: false
    gui:
      type: generic
  psu:
    type: drivers.rigol.DP832
`;

void describe('loadConfig Contract Tests', () => {
  let tmpDir: string;
  let residualPaths: string[];

  beforeEach(() => {
    tmpDir = createTempDir();
    residualPaths = [];
  });

  afterEach(() => {
    for (const residualPath of residualPaths) {
      fs.rmSync(residualPath, { force: true });
    }
    removeTempDir(tmpDir);
  });

  const writeConfig = (content: string): string => {
    const configPath = path.join(tmpDir, 'station.yaml');
    fs.writeFileSync(configPath, content);
    return configPath;
  };

  void it('splits the file and writes the residual document as YAML', async () => {
    const loaded = await loadConfig(writeConfig(STATION_YAML));
    residualPaths.push(loaded.residualPath);

    assert.deepEqual(loaded.serverConfig, {
      dmm: { initialize: false },
      psu: { initialize: true },
    });
    assert.equal(loaded.guiConfig['dmm']?.type, DEFAULT_GUI_TYPE);
    assert.match(path.basename(loaded.residualPath), /^instrument-station-[0-9a-f-]+\.yaml$/);

    const written: unknown = parseYaml(fs.readFileSync(loaded.residualPath, 'utf-8'));
    assert.deepEqual(written, {
      instruments: {
        dmm: { type: 'drivers.keithley.Keithley2000', address: 'GPIB0::16::INSTR' },
        psu: { type: 'drivers.rigol.DP832' },
      },
    });
    assert.deepEqual(written, loaded.residual);
  });

  void it('keeps comments of the source file in the residual file', async () => {
    const loaded = await loadConfig(
      writeConfig(
        [
          'instruments:',
          '  # bench multimeter',
          '  dmm:',
          '    type: drivers.keithley.Keithley2000',
          '    initialize: false # slow warm-up',
          '    gui:',
          '      type: generic',
          '  psu:',
          '    type: drivers.rigol.DP832',
          '',
        ].join('\n')
      )
    );
    residualPaths.push(loaded.residualPath);

    const written = fs.readFileSync(loaded.residualPath, 'utf-8');
    assert.ok(
      written.includes('  # bench multimeter\n  dmm:\n    type: drivers.keithley.Keithley2000\n'),
      written
    );
    assert.equal(written.includes('initialize'), false);
    assert.equal(written.includes('gui'), false);
    assert.deepEqual(parseYaml(written), loaded.residual);
  });

  void it('writes a new residual file on every call', async () => {
    const configPath = writeConfig(STATION_YAML);

    const first = await loadConfig(configPath);
    const second = await loadConfig(configPath);
    residualPaths.push(first.residualPath, second.residualPath);

    assert.notEqual(first.residualPath, second.residualPath);
  });

  void it('rejects a missing file with ConfigNotFoundError', async () => {
    const missing = path.join(tmpDir, 'missing.yaml');

    await assert.rejects(loadConfig(missing), (error: unknown) => {
      assert.ok(error instanceof ConfigNotFoundError);
      assert.equal(error.message, `Configuration file not found: ${missing}`);
      return true;
    });
  });

  void it('rejects invalid YAML with the file path in the message', async () => {
    const configPath = writeConfig('instruments: [unclosed\n');

    await assert.rejects(loadConfig(configPath), (error: unknown) => {
      assert.ok(error instanceof ConfigFormatError);
      assert.equal(error.source, configPath);
      assert.ok(error.message.startsWith(`${configPath}: `));
      return true;
    });
  });

  void it('prefixes structural errors with the file path', async () => {
    const configPath = writeConfig('station: lab-3\n');

    await assert.rejects(loadConfig(configPath), {
      name: 'ConfigFormatError',
      message: `${configPath}: missing "instruments" mapping`,
    });
  });
});

void describe('writeResidualConfig', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tmpDir);
  });

  void it('writes into the given directory', async () => {
    const residualPath = await writeResidualConfig({ instruments: {} }, tmpDir);

    assert.equal(path.dirname(residualPath), tmpDir);
    assert.equal(fs.readFileSync(residualPath, 'utf-8'), 'instruments: {}\n');
  });
});
