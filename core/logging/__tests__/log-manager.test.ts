import { GeoJsonGeometryFactory } from '../../factories/geojson-factory';
import { WktParser } from '../../wkt/parser';
import { initializeLogger } from '../init';
import { LogLevel, LogManager } from '../log-manager';

describe('LogManager', () => {
  const logger = LogManager.getInstance();

  beforeEach(() => {
    logger.setConsoleOutput(false);
    logger.clearLogs();
    logger.clearFilters();
    logger.setLogLevel(LogLevel.INFO);
  });

  it('should return the same instance', () => {
    expect(LogManager.getInstance()).toBe(logger);
  });

  it('should drop entries below the global level', () => {
    logger.debug('Test', 'hidden');
    logger.info('Test', 'shown');

    expect(logger.getLogs().map(entry => entry.message)).toEqual(['shown']);
  });

  it('should let a source filter override the global level', () => {
    logger.addFilter('WktParser', LogLevel.DEBUG);
    logger.addFilter('Noisy', LogLevel.ERROR);

    logger.debug('WktParser', 'parser detail');
    logger.warn('Noisy', 'muted');

    expect(logger.getLogs().map(entry => entry.message)).toEqual(['parser detail']);
    expect(logger.getFilters()).toEqual({ WktParser: LogLevel.DEBUG, Noisy: LogLevel.ERROR });

    logger.removeFilter('Noisy');
    logger.warn('Noisy', 'audible');
    expect(logger.getLogs()).toHaveLength(2);
  });

  it('should strip internal detail keys', () => {
    logger.info('Test', 'message', { _internal: true, visible: 2 });

    expect(logger.getLogs()[0].details).toEqual({ visible: 2 });
  });

  it('should export entries as text', () => {
    logger.info('Test', 'message', { visible: 2 });
    const [entry] = logger.getLogs();

    expect(logger.exportLogs()).toBe(`[${entry.timestamp}] [INFO] [Test] message\n{\n  "visible": 2\n}`);
  });

  it('should mark circular details', () => {
    const details: Record<string, unknown> = { name: 'loop' };
    details.self = details;
    logger.info('Test', 'circular', details);
    const [entry] = logger.getLogs();

    expect(logger.exportLogs()).toBe(
      `[${entry.timestamp}] [INFO] [Test] circular\n` +
        '{\n  "name": "loop",\n  "self": {\n    "name": "loop",\n    "self": "[Circular]"\n  }\n}'
    );
  });

  it('should record failed parses', () => {
    logger.setLogLevel(LogLevel.WARN);
    const parser = new WktParser({ defaultFactory: new GeoJsonGeometryFactory() });

    expect(parser.tryParse('FOO').success).toBe(false);

    const entries = logger.getLogs();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: LogLevel.WARN,
      source: 'WktParser',
      message: 'WKT parse failed',
      details: { code: 'UNKNOWN_TYPE', message: 'Unknown type tag: "foo".' }
    });
  });

  it('should mirror entries to the console when enabled', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    logger.setConsoleOutput(true);

    logger.info('Test', 'to console');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(/\[INFO\] \[Test\] to console$/);
    info.mockRestore();
  });
});

describe('initializeLogger', () => {
  afterEach(() => {
    LogManager.getInstance().setConsoleOutput(false);
  });

  it('should log errors only outside development', () => {
    const logger = initializeLogger({ NODE_ENV: 'production' });

    expect(logger.getLogLevel()).toBe(LogLevel.ERROR);
    expect(logger.getLogs()).toHaveLength(0);
  });

  it('should log everything in development', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = initializeLogger({ NODE_ENV: 'development' });

    expect(logger.getLogLevel()).toBe(LogLevel.DEBUG);
    expect(logger.getLogs().map(entry => entry.message)).toEqual(['Logger initialized']);
    expect(info).toHaveBeenCalledTimes(1);
    info.mockRestore();
  });

  it('should take the level from WKT_LOG_LEVEL', () => {
    expect(initializeLogger({ WKT_LOG_LEVEL: 'warn' }).getLogLevel()).toBe(LogLevel.WARN);
  });
});
