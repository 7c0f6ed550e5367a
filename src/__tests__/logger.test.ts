import { debug, describeError, error, getLogLevel, log, parseLevel, setLogLevel, warn } from '../logger';

describe('logger', () => {
  const initial = getLogLevel();
  let out: jest.SpyInstance;
  let err: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    out = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    err = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    setLogLevel(initial);
    jest.restoreAllMocks();
  });

  test('parseLevel accepts known levels only', () => {
    expect(parseLevel(' DEBUG ')).toBe('debug');
    expect(parseLevel('warn')).toBe('warn');
    expect(parseLevel('verbose')).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });

  test('debug output is gated by level', () => {
    setLogLevel('info');
    debug('hidden');
    log('shown', 1);
    expect(out).toHaveBeenCalledTimes(1);
    expect(out).toHaveBeenCalledWith('[zac]', 'shown', 1);
    setLogLevel('debug');
    debug('now shown');
    expect(out).toHaveBeenLastCalledWith('[zac] DEBUG', 'now shown');
  });

  test('errors print at every level', () => {
    setLogLevel('error');
    warn('quiet');
    error('loud');
    expect(warnSpy).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledWith('[zac] ERROR', 'loud');
  });

  test('describeError renders errors and other values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
    expect(describeError(42)).toBe('42');
  });
});
