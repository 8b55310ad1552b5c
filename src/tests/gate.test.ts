import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { Readable, Writable } from 'node:stream';
import { createTerminalConfirm, describeAction } from '../channels/terminal.js';
import { createConfirmationGate, denyAll, type Confirm } from '../core/gate.js';
import { commandRequest, planRequest, readFileRequest, writeFileRequest } from '../core/requests.js';
import type { SafetyConfig } from '../core/types.js';
import { makeConfig, makeSandbox, type Sandbox } from './fixtures.js';

class Sink extends Writable {
  text = '';

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

describe('ConfirmationGate', () => {
  let sandbox: Sandbox;
  let strict: SafetyConfig;
  const request = commandRequest('git status');

  before(() => {
    sandbox = makeSandbox('guardrun-gate-');
    strict = makeConfig(sandbox, { requireConfirmation: true });
  });

  after(() => {
    sandbox.cleanup();
  });

  it('approves without asking when confirmation is off', async () => {
    let asked = 0;
    const confirm: Confirm = async () => {
      asked++;
      return false;
    };
    const gate = createConfirmationGate({ config: makeConfig(sandbox), confirm });
    assert.deepStrictEqual(await gate(request), { approved: true, reason: 'Confirmation not required' });
    assert.strictEqual(asked, 0);
  });

  it('approves a pre-authorized request', async () => {
    const gate = createConfirmationGate({ config: strict, confirm: denyAll, preAuthorized: true });
    assert.deepStrictEqual(await gate(request), { approved: true, reason: 'Pre-authorized' });
  });

  it('approves only an explicit yes', async () => {
    const yes = createConfirmationGate({ config: strict, confirm: async () => true });
    assert.deepStrictEqual(await yes(request), { approved: true, reason: 'Approved by human' });

    const no = createConfirmationGate({ config: strict, confirm: denyAll });
    assert.deepStrictEqual(await no(request), { approved: false, reason: 'Declined by human' });

    const silent = createConfirmationGate({ config: strict, confirm: async () => undefined });
    assert.deepStrictEqual(await silent(request), {
      approved: false,
      reason: 'No confirmation answer (default deny)',
    });
  });

  it('fails closed when the confirmation channel throws', async () => {
    const gate = createConfirmationGate({
      config: strict,
      confirm: async () => {
        throw new Error('channel down');
      },
    });
    assert.deepStrictEqual(await gate(request), { approved: false, reason: 'Confirmation failed: channel down' });
  });
});

describe('terminal confirmation', () => {
  it('approves on y', async () => {
    const output = new Sink();
    const confirm = createTerminalConfirm({ input: Readable.from(['y\n']), output, assumeInteractive: true });
    assert.strictEqual(await confirm(commandRequest('ls')), true);
    assert.ok(output.text.includes('Run command: ls'));
    assert.ok(output.text.includes('Proceed? [y/N]'));
  });

  it('declines on anything else', async () => {
    const confirm = createTerminalConfirm({
      input: Readable.from(['sure\n']),
      output: new Sink(),
      assumeInteractive: true,
    });
    assert.strictEqual(await confirm(commandRequest('ls')), false);
  });

  it('declines at end of input', async () => {
    const confirm = createTerminalConfirm({ input: Readable.from([]), output: new Sink(), assumeInteractive: true });
    assert.strictEqual(await confirm(commandRequest('ls')), false);
  });

  it('declines without prompting when input is not interactive', async () => {
    const output = new Sink();
    const confirm = createTerminalConfirm({ input: Readable.from(['y\n']), output, assumeInteractive: false });
    assert.strictEqual(await confirm(commandRequest('ls')), false);
    assert.strictEqual(output.text, '  [confirm] stdin is not interactive; declining\n');
  });

  it('describes each kind of action', () => {
    assert.strictEqual(describeAction(commandRequest(['ls', '-la'], 'src')), 'Run command: ls -la (in src)');
    assert.strictEqual(describeAction(readFileRequest('a.txt')), 'Read file: a.txt');
    assert.strictEqual(describeAction(writeFileRequest('a.txt', 'héllo')), 'Write file: a.txt (6 bytes)');
    assert.strictEqual(
      describeAction(planRequest([commandRequest('ls'), readFileRequest('a.txt')])),
      'Run plan with 2 step(s):\n      1. Run command: ls\n      2. Read file: a.txt',
    );
  });
});
