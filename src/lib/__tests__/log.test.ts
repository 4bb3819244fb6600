import { describe, it, expect, vi, afterEach } from 'vitest';
import { Logger, QUIET, parseVerbosity } from '../log.js';

describe('parseVerbosity', () => {
    it('enables the categories named by letter, in any case', () => {
        expect(parseVerbosity('pw')).toEqual({ progress: true, details: false, info: false, warn: true });
    });

    it('enables everything for A', () => {
        expect(parseVerbosity('A')).toEqual({ progress: true, details: true, info: true, warn: true });
    });

    it('enables nothing for an empty descriptor', () => {
        expect(parseVerbosity('')).toEqual(QUIET);
    });
});

describe('Logger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes enabled categories to stderr with a prefix', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const log = new Logger(parseVerbosity('W'));
        log.warn('careful');
        log.progress('hidden');
        log.details('hidden');
        log.info('hidden');
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy).toHaveBeenCalledWith('[wallweaver:warn] careful');
    });

    it('stays silent when quiet', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const log = new Logger(QUIET);
        log.warn('nothing');
        log.progress('nothing');
        expect(spy).not.toHaveBeenCalled();
    });
});
