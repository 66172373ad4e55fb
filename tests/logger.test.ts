import assert from 'node:assert/strict';
import { test } from './testHarness';
import { createLogger, formatContext, logManager, type LogSink } from '../src/shared/logging/logger';

function capture(level: 'debug' | 'info', json = false): { lines: string[]; restore: () => void } {
  const lines: string[] = [];
  const sink: LogSink = (_level, line) => lines.push(line);
  logManager.configure({ level, json, sink });
  return {
    lines,
    restore: () => logManager.configure({ level: 'none', json: false, sink: null }),
  };
}

test('context renders sorted with buffers as hex', () => {
  assert.equal(
    formatContext({ payload: Buffer.from([0x42, 0x00]), address: '192.168.1.50', note: 'two words', skipped: undefined }),
    ' [address=192.168.1.50 note="two words" payload=4200]',
  );
  assert.equal(formatContext({}), '');
});

test('lines carry level and scopes and respect the level filter', () => {
  const { lines, restore } = capture('debug');
  try {
    const log = createLogger('Discovery', 'FrameSource');
    log.spam('dropped');
    log.debug('probe sent', { address: '10.0.0.2' });
    log.child('Probe').info('ok');
  } finally {
    restore();
  }
  assert.equal(lines.length, 2);
  assert.ok(lines[0].endsWith('[DEBUG][Discovery|FrameSource] [address=10.0.0.2] probe sent'));
  assert.ok(lines[1].endsWith('[INFO][Discovery|FrameSource|Probe] ok'));
});

test('json mode emits one object per line', () => {
  const { lines, restore } = capture('info', true);
  try {
    createLogger('Upload').warn('upload failed', { code: 'connect-timeout' });
  } finally {
    restore();
  }
  const parsed: unknown = JSON.parse(lines[0]);
  assert.ok(typeof parsed === 'object' && parsed !== null);
  assert.deepEqual(
    { ...parsed, timestamp: undefined },
    {
      timestamp: undefined,
      level: 'warn',
      scopes: ['Upload'],
      message: 'upload failed',
      context: { code: 'connect-timeout' },
    },
  );
});
