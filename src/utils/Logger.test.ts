import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Logger, LogLevel, type LogSink } from './Logger';

describe('Logger', () => {
  let previousLevel: LogLevel;
  let debugSpy: MockInstance;
  let infoSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    previousLevel = Logger.getLevel();
    Logger.setLevel(LogLevel.DEBUG);
    Logger.setSink(null);
    debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    Logger.setLevel(previousLevel);
    Logger.setSink(null);
    vi.restoreAllMocks();
  });

  it('should prefix messages with the module name', () => {
    const logger = new Logger('TestModule');
    logger.info('hello');
    expect(infoSpy).toHaveBeenCalledWith('[TestModule]', 'hello');
  });

  it('should route each level to the matching console method', () => {
    const logger = new Logger('MyModule');
    const extra = { key: 'value' };
    logger.debug('d', extra, 42);
    logger.warn('w');
    logger.error('e');

    expect(debugSpy).toHaveBeenCalledWith('[MyModule]', 'd', extra, 42);
    expect(warnSpy).toHaveBeenCalledWith('[MyModule]', 'w');
    expect(errorSpy).toHaveBeenCalledWith('[MyModule]', 'e');
  });

  it('should drop messages below the global level', () => {
    Logger.setLevel(LogLevel.WARN);
    const logger = new Logger('MyModule');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it('should silence errors only at SILENT', () => {
    const logger = new Logger('MyModule');
    Logger.setLevel(LogLevel.ERROR);
    logger.error('shown');
    Logger.setLevel(LogLevel.SILENT);
    logger.error('hidden');

    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('should send output to a custom sink until reset', () => {
    const sink = vi.fn<LogSink>();
    Logger.setSink(sink);
    new Logger('Sinked').warn('to sink', 1);

    expect(sink).toHaveBeenCalledWith(LogLevel.WARN, '[Sinked]', 'to sink', 1);
    expect(warnSpy).not.toHaveBeenCalled();

    Logger.setSink(null);
    new Logger('Sinked').warn('to console');
    expect(warnSpy).toHaveBeenCalledWith('[Sinked]', 'to console');
  });

  it('should derive child loggers with a combined prefix', () => {
    new Logger('PlaybackScheduler').child('cache').info('hit');
    expect(infoSpy).toHaveBeenCalledWith('[PlaybackScheduler:cache]', 'hit');
  });
});
