import { ConsoleLogger, silentLogger, type LogLevel } from '../../core/logging/logger';

function capture(level?: LogLevel) {
  const lines: Array<[LogLevel, string]> = [];
  const logger = new ConsoleLogger({ level, write: (lineLevel, line) => lines.push([lineLevel, line]) });
  return { logger, lines };
}

describe('ConsoleLogger', () => {
  it('formats level, scope and data', () => {
    const { logger, lines } = capture();

    logger.child('orchestrator').child('monitor').warn('Agent missed heartbeats', { agentId: 'a1', silentForMs: 3500 });

    expect(lines).toEqual([
      ['warn', '[WARN] [orchestrator:monitor] Agent missed heartbeats {"agentId":"a1","silentForMs":3500}']
    ]);
  });

  it('drops lines below the configured level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('noise');
    logger.info('still noise');
    logger.error('Dispatch failed', {});

    expect(lines).toEqual([['error', '[ERROR] Dispatch failed']]);
  });

  it('serializes errors by name and message', () => {
    const { logger, lines } = capture('debug');

    logger.debug('Handler threw', { error: new RangeError('out of range') });

    expect(lines[0]?.[1]).toBe('[DEBUG] Handler threw {"error":{"name":"RangeError","message":"out of range"}}');
  });

  it('survives data that cannot be serialized', () => {
    const { logger, lines } = capture();
    const loop: Record<string, unknown> = {};
    loop.self = loop;

    logger.info('Cycle', loop);

    expect(lines[0]?.[1]).toBe('[INFO] Cycle [unserializable]');
  });

  it('writes through the console by default', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      new ConsoleLogger({ scope: 'bus' }).info('Connected');
      expect(spy).toHaveBeenCalledWith('[INFO] [bus] Connected');
    } finally {
      spy.mockRestore();
    }
  });

  it('offers a silent logger whose children are silent too', () => {
    expect(silentLogger.child('x')).toBe(silentLogger);
  });
});
