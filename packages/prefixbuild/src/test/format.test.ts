import { describe, it, afterEach, mock } from 'node:test';
import * as assert from 'node:assert/strict';
import {
  stripAnsi,
  bold, dim, red, green, yellow, blue, cyan,
  table, statusColor, exitCodeColor,
  setLogLevel, getLogLevel, isEnabled, levelFromFlags,
  error, warn, info, success, debug, header,
} from '../output/format.js';

afterEach(() => {
  setLogLevel('info');
  mock.restoreAll();
});

describe('stripAnsi()', () => {
  it('removes ANSI color codes', () => {
    assert.equal(stripAnsi('\x1b[31mhello\x1b[0m'), 'hello');
  });

  it('removes multiple ANSI codes', () => {
    assert.equal(stripAnsi('\x1b[1m\x1b[36mfoo\x1b[0m bar \x1b[33mbaz\x1b[0m'), 'foo bar baz');
  });

  it('preserves plain text', () => {
    assert.equal(stripAnsi('no ansi here'), 'no ansi here');
  });
});

describe('color functions', () => {
  it('all color functions return text that stripAnsi can clean', () => {
    const fns = [bold, dim, red, green, yellow, blue, cyan];
    for (const fn of fns) {
      assert.equal(stripAnsi(fn('x')), 'x', `${fn.name} should wrap cleanly`);
    }
  });

  it('statusColor keeps the status text', () => {
    for (const s of ['succeeded', 'failed', 'running', 'other']) {
      assert.equal(stripAnsi(statusColor(s)), s);
    }
  });

  it('exitCodeColor renders codes and a dash for null', () => {
    assert.equal(stripAnsi(exitCodeColor(0)), '0');
    assert.equal(stripAnsi(exitCodeColor(2)), '2');
    assert.equal(stripAnsi(exitCodeColor(null)), '—');
  });
});

describe('table()', () => {
  it('aligns columns correctly', () => {
    const lines = table(['Name', 'Status'], [['alpha', 'ok'], ['beta-long', 'fail']]).split('\n');
    assert.equal(lines.length, 4);
    assert.equal(stripAnsi(lines[0]), 'Name       Status');
    assert.equal(lines[2], 'alpha      ok    ');
    assert.equal(lines[3], 'beta-long  fail  ');
  });

  it('handles ANSI-colored cells without misalignment', () => {
    const lines = table(['Name', 'Status'], [['a', green('ok')], ['bb', red('failed')]]).split('\n');
    assert.equal(stripAnsi(lines[2]).indexOf('ok'), stripAnsi(lines[3]).indexOf('failed'));
  });

  it('handles empty rows', () => {
    assert.equal(table(['A', 'B'], []).split('\n').length, 2);
  });
});

describe('log levels', () => {
  it('defaults to info', () => {
    assert.equal(getLogLevel(), 'info');
    assert.equal(isEnabled('info'), true);
    assert.equal(isEnabled('debug'), false);
  });

  it('error level hides warnings and info', () => {
    setLogLevel('error');
    assert.equal(isEnabled('error'), true);
    assert.equal(isEnabled('warn'), false);
    assert.equal(isEnabled('info'), false);
  });

  it('levelFromFlags: debug beats verbose, dry-run implies info', () => {
    assert.equal(levelFromFlags({ debug: true, verbose: true }, 'error'), 'debug');
    assert.equal(levelFromFlags({ verbose: true }, 'error'), 'info');
    assert.equal(levelFromFlags({ dryRun: true }, 'error'), 'info');
    assert.equal(levelFromFlags({}, 'error'), 'error');
  });

  it('gates output functions by level', () => {
    const log = mock.method(console, 'log', () => {});
    const err = mock.method(console, 'error', () => {});
    setLogLevel('error');

    info('hidden');
    success('hidden');
    warn('hidden');
    debug('hidden');
    header('hidden');
    error('shown');

    assert.equal(log.mock.callCount(), 0);
    assert.equal(err.mock.callCount(), 1);
    assert.equal(stripAnsi(String(err.mock.calls[0].arguments[0])), '[prefixbuild] shown');
  });

  it('debug prints only at debug level', () => {
    const log = mock.method(console, 'log', () => {});
    debug('nope');
    setLogLevel('debug');
    debug('yes');
    assert.equal(log.mock.callCount(), 1);
    assert.equal(stripAnsi(String(log.mock.calls[0].arguments[0])), '[prefixbuild] yes');
  });
});
