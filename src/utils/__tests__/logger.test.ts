import { Logger } from '../logger';

describe('Logger', () => {
  it('suppresses messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger(undefined, 'warn');

    logger.info('hidden');
    logger.warn('shown');

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toBe('shown');
  });

  it('prefixes child messages with their scope', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger('pipeline', 'info');

    logger.child('http').warn('slow', { url: 'https://portal.test' });

    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[WARN\]$/), '[pipeline:http] slow', { url: 'https://portal.test' });
  });

  it('writes the error after the context data', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new Logger(undefined, 'info');
    const cause = new Error('socket reset');

    logger.error('Feed generation failed', cause, { stage: 'parse' });
    logger.error('Feed generation failed', cause);

    expect(error.mock.calls[0].slice(1)).toEqual(['Feed generation failed', { stage: 'parse' }, cause]);
    expect(error.mock.calls[1].slice(1)).toEqual(['Feed generation failed', '', cause]);
  });

  it('applies a level change to children created earlier', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const root = new Logger(undefined, 'error');
    const child = root.child('parser');

    root.setLevel('debug');
    child.debug('now visible');

    expect(child.level).toBe('debug');
    expect(debug).toHaveBeenCalledTimes(1);
  });
});
