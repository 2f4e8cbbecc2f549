import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { createEngineLogger, fromPinoLogger } from '../logging.js';

describe('createEngineLogger', () => {
  let lines: Array<Record<string, unknown>>;
  const destination = {
    write(chunk: string): void {
      lines.push(JSON.parse(chunk));
    },
  };

  beforeEach(() => {
    lines = [];
  });

  it('should bind the layer and namespace', () => {
    const logger = createEngineLogger('coffee', { destination });

    logger.info('Plugins loaded', { loaded: 2, failed: 0 });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: 'Plugins loaded',
      layer: 'plugin-engine',
      namespace: 'coffee',
      loaded: 2,
      failed: 0,
    });
  });

  it('should respect the level', () => {
    const logger = createEngineLogger('coffee', { destination, level: 'warn' });

    logger.info('hidden');
    logger.debug('hidden');
    logger.warn('shown');

    expect(lines.map((line) => line.msg)).toEqual(['shown']);
  });

  it('should serialize errors', () => {
    const logger = createEngineLogger('coffee', { destination });

    logger.error('Loading plugins aborted', new Error('grinder jammed'));

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: 'Loading plugins aborted',
      err: { type: 'Error', message: 'grinder jammed' },
    });
  });

  it('should add bindings in children', () => {
    const logger = createEngineLogger('coffee', { destination, bindings: { app: 'cafe' } });

    logger.child({ plugin: 'espresso' }).warn('Slow init');

    expect(lines[0]).toMatchObject({ level: 40, app: 'cafe', namespace: 'coffee', plugin: 'espresso', msg: 'Slow init' });
  });
});

describe('fromPinoLogger', () => {
  it('should log through the given logger', () => {
    const lines: Array<Record<string, unknown>> = [];
    const core = pino({ level: 'debug' }, { write: (chunk: string) => lines.push(JSON.parse(chunk)) });

    fromPinoLogger(core).debug('Initializing plugin', { plugin: 'espresso' });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 20, msg: 'Initializing plugin', plugin: 'espresso' });
  });
});
