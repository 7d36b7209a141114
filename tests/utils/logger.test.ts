import { jest } from '@jest/globals';
import { Logger } from '../../src/utils/logger';

describe('Logger', () => {
    let consoleError: jest.SpiedFunction<typeof console.error>;

    beforeEach(() => {
        consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        consoleError.mockRestore();
    });

    it('defaults to info and drops debug output', () => {
        const logger = new Logger();

        logger.debug('hidden');
        logger.info('shown');

        expect(logger.getLevel()).toBe('info');
        expect(consoleError).toHaveBeenCalledTimes(1);
        expect(consoleError.mock.calls[0][0]).toMatch(/^\S+ \[INFO\] shown$/);
    });

    it('filters below the configured level', () => {
        const logger = new Logger();
        logger.setLevel('warn');

        logger.info('hidden');
        logger.warn('careful');
        logger.error('failed', new Error('boom'));

        expect(logger.isLevelEnabled('info')).toBe(false);
        expect(logger.isLevelEnabled('error')).toBe(true);
        expect(consoleError).toHaveBeenCalledTimes(2);
        expect(consoleError.mock.calls[0][0]).toMatch(/\[WARN\] careful$/);
        expect(consoleError.mock.calls[1][1]).toEqual(new Error('boom'));
    });

    it('announces level changes at debug', () => {
        const logger = new Logger();
        logger.setLevel('debug');

        expect(consoleError).toHaveBeenCalledTimes(1);
        expect(consoleError.mock.calls[0][0]).toMatch(/\[DEBUG\] Log level set to: debug$/);
    });
});
