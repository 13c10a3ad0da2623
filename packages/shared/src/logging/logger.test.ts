import { describe, it, expect } from 'vitest';
import { createLogger, type LogLevel } from './logger.js';

function capture(): { lines: { level: LogLevel; line: string }[]; sink: (level: LogLevel, line: string) => void } {
  const lines: { level: LogLevel; line: string }[] = [];
  return { lines, sink: (level, line) => lines.push({ level, line }) };
}

describe('createLogger', () => {
  it('should drop messages below the configured level', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines.map((l) => l.level)).toEqual(['warn', 'error']);
  });

  it('should format level, prefix and context', () => {
    const { lines, sink } = capture();
    const logger = createLogger({ prefix: 'refs', sink });

    logger.info('Opening file', { path: 'a.bib' });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] \[refs\] Opening file \{"path":"a\.bib"\}$/);
  });

  it('should default the prefix to bibkit and omit empty context', () => {
    const { lines, sink } = capture();
    createLogger({ sink }).info('ready');

    expect(lines[0]?.line.endsWith('[INFO] [bibkit] ready')).toBe(true);
  });

  it('should merge child context into every line', () => {
    const { lines, sink } = capture();
    const child = createLogger({ sink, context: { run: 1 } }).child({ file: 'b.bib' });

    child.warn('bad fragment', { offset: 12 });

    expect(lines[0]?.line.endsWith('bad fragment {"run":1,"file":"b.bib","offset":12}')).toBe(true);
  });

  it('should keep the parent level in children', () => {
    const { lines, sink } = capture();
    const child = createLogger({ level: 'error', sink }).child({});

    child.warn('hidden');

    expect(lines).toHaveLength(0);
  });
});
