/**
 * Unit tests for CLI option parsing
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { parseMessageArgument } from '@/commands/ask.js';
import { parsePort, parseTimeout } from '@/commands/shared/commonOptions.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

void describe('parsePort', () => {
  void it('accepts integer ports', () => {
    assert.equal(parsePort('5555'), 5555);
    assert.equal(parsePort('65535'), 65535);
  });

  void it('rejects other values with INVALID_ARGUMENTS', () => {
    for (const value of ['0', '65536', '55.5', 'abc', '']) {
      assert.throws(
        () => parsePort(value),
        (error: unknown) => {
          assert.ok(error instanceof CommandError);
          assert.equal(error.exitCode, EXIT_CODES.INVALID_ARGUMENTS);
          assert.equal(
            error.message,
            `Invalid port "${value}": expected an integer between 1 and 65535`
          );
          return true;
        }
      );
    }
  });
});

void describe('parseTimeout', () => {
  void it('accepts positive milliseconds and rounds fractions up', () => {
    assert.equal(parseTimeout('2000'), 2000);
    assert.equal(parseTimeout('250.2'), 251);
    assert.equal(parseTimeout('0.5'), 1);
  });

  void it('rejects non-positive and non-numeric values', () => {
    assert.throws(() => parseTimeout('0'), CommandError);
    assert.throws(() => parseTimeout('-5'), CommandError);
    assert.throws(() => parseTimeout('soon'), CommandError);
  });
});

void describe('parseMessageArgument', () => {
  void it('parses JSON arguments', () => {
    assert.deepEqual(parseMessageArgument('{"operation":"get","target":"dmm"}'), {
      operation: 'get',
      target: 'dmm',
    });
    assert.equal(parseMessageArgument('42'), 42);
    assert.equal(parseMessageArgument('"ping"'), 'ping');
  });

  void it('sends anything else as a plain string', () => {
    assert.equal(parseMessageArgument('ping'), 'ping');
    assert.equal(parseMessageArgument('{broken'), '{broken');
  });
});

void describe('commandRegistry', () => {
  const buildProgram = (): Command => {
    const program = new Command().exitOverride();
    commandRegistry.forEach((register) => register(program));
    return program;
  };

  void it('registers ask and split-config', () => {
    const names = buildProgram().commands.map((command) => command.name());

    assert.deepEqual(names, ['ask', 'split-config']);
  });

  void it('rejects an invalid --port while parsing', async () => {
    await assert.rejects(
      buildProgram().parseAsync(['ask', 'ping', '--port', '99999'], { from: 'user' }),
      {
        name: 'CommandError',
        message: 'Invalid port "99999": expected an integer between 1 and 65535',
      }
    );
  });
});
