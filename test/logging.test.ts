import { Writable } from 'stream';
import { applyLogLevel } from '../src/logging';

function createConsole(): { target: Console; lines: string[] } {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().trimEnd());
      callback();
    },
  });
  return { target: new console.Console({ stdout: sink, stderr: sink }), lines };
}

function logEveryLevel(target: Console): void {
  target.debug('debug line');
  target.info('info line');
  target.log('log line');
  target.warn('warn line');
  target.error('error line');
}

describe('applyLogLevel', () => {
  it('should keep everything at debug', () => {
    const { target, lines } = createConsole();
    applyLogLevel('debug', target);
    logEveryLevel(target);

    expect(lines).toEqual(['debug line', 'info line', 'log line', 'warn line', 'error line']);
  });

  it('should drop debug output at info', () => {
    const { target, lines } = createConsole();
    applyLogLevel('info', target);
    logEveryLevel(target);

    expect(lines).toEqual(['info line', 'log line', 'warn line', 'error line']);
  });

  it('should keep only warnings and errors at warn', () => {
    const { target, lines } = createConsole();
    applyLogLevel('warn', target);
    logEveryLevel(target);

    expect(lines).toEqual(['warn line', 'error line']);
  });

  it('should keep only errors at error', () => {
    const { target, lines } = createConsole();
    applyLogLevel('error', target);
    logEveryLevel(target);

    expect(lines).toEqual(['error line']);
  });
});
