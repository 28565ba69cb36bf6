import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger } from '../logger';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops records below its level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger('warn');

    logger.debug('debug message');
    logger.info('info message');
    logger.warn('warn message', { path: '/episodes' });
    logger.error('error message');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('warn message', { path: '/episodes' });
    expect(error).toHaveBeenCalledWith('error message');
  });

  it('defaults to error', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = new ConsoleLogger();

    logger.warn('warn message');
    logger.error('error message', { status: 500 });

    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('error message', { status: 500 });
  });

  it('logs nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger('silent').error('error message');

    expect(error).not.toHaveBeenCalled();
  });

  it('logs everything at debug', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new ConsoleLogger('debug');

    logger.debug('details', { body: 'title=Pilot' });
    logger.info('summary');

    expect(debug).toHaveBeenCalledWith('details', { body: 'title=Pilot' });
    expect(info).toHaveBeenCalledWith('summary');
  });
});
