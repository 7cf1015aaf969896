/**
 * Unit Tests — loadTimerConfig
 *
 * The facility name is read from the environment, trimmed and lowercased.
 * Anything unrecognised is reported once and replaced by the console default.
 */
import { DEFAULT_CONFIG, FACILITY_ENV_VAR, loadTimerConfig } from '../../config.js';

describe('loadTimerConfig()', () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('should default to console when the variable is unset', () => {
    expect(loadTimerConfig({})).toEqual({ facility: 'console' });
    expect(warn).not.toHaveBeenCalled();
  });

  it('should treat a blank value as unset', () => {
    expect(loadTimerConfig({ [FACILITY_ENV_VAR]: '   ' })).toEqual({ facility: 'console' });
    expect(warn).not.toHaveBeenCalled();
  });

  it.each([
    ['performance', 'performance'],
    ['log', 'log'],
    ['off', 'off'],
    [' LOG ', 'log'],
    ['Performance', 'performance'],
  ])('should accept %p as %p', (raw, expected) => {
    expect(loadTimerConfig({ [FACILITY_ENV_VAR]: raw })).toEqual({ facility: expected });
  });

  it('should warn and fall back to console on an unknown facility', () => {
    expect(loadTimerConfig({ [FACILITY_ENV_VAR]: 'bogus' })).toEqual({ facility: 'console' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.stringContaining(`Ignoring invalid ${FACILITY_ENV_VAR}="bogus"`),
    );
  });

  it('should return a fresh fallback config on each call', () => {
    const first = loadTimerConfig({ [FACILITY_ENV_VAR]: 'bogus' });
    first.facility = 'off';

    expect(loadTimerConfig({ [FACILITY_ENV_VAR]: 'bogus' })).toEqual({ facility: 'console' });
    expect(DEFAULT_CONFIG).toEqual({ facility: 'console' });
  });
});
