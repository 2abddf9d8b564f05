import { describe, it, expect, vi, afterEach } from 'vitest';
import { devLog, devWarn, devError } from '../src/utils/errorHandler';
import { ConfigError, formatError } from '../src/utils/errors';

describe('errorHandler', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('devLog', () => {
        const spyOnLog = () => vi.spyOn(console, 'log').mockImplementation(() => { });

        it('should log with formatted context', () => {
            const consoleSpy = spyOnLog();
            devLog('TestContext', 'Test message');
            expect(consoleSpy).toHaveBeenCalledWith('[TestContext] Test message');
        });

        it('should include data parameter when provided', () => {
            const consoleSpy = spyOnLog();
            const data = { key: 'value' };
            devLog('TestContext', 'Test message', data);
            expect(consoleSpy).toHaveBeenCalledWith('[TestContext] Test message', data);
        });

        it('should pass null data through', () => {
            const consoleSpy = spyOnLog();
            devLog('TestContext', 'Test message', null);
            expect(consoleSpy).toHaveBeenCalledWith('[TestContext] Test message', null);
        });
    });

    describe('devWarn', () => {
        it('should warn with formatted context', () => {
            const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => { });
            devWarn('TestContext', 'Warning message', { info: 'details' });
            expect(consoleSpy).toHaveBeenCalledWith('[TestContext] Warning message', { info: 'details' });
        });

        it('should omit data when not provided', () => {
            const consoleSpy = vi.spyOn(console, 'warn').mockImplementation(() => { });
            const logSpy = vi.spyOn(console, 'log').mockImplementation(() => { });
            devWarn('TestContext', 'Warning message');
            expect(consoleSpy.mock.calls).toEqual([['[TestContext] Warning message']]);
            expect(logSpy).not.toHaveBeenCalled();
        });
    });

    describe('devError', () => {
        it('should log and return the display line', () => {
            const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
            const line = devError('TestContext', new Error('details'));
            expect(line).toBe('TestContext: details');
            expect(consoleSpy).toHaveBeenCalledWith('[TestContext]', 'TestContext: details');
        });
    });
});

describe('formatError', () => {
    it('should use the message of Error instances', () => {
        expect(formatError(new ConfigError('maxSuggestions', 'bad value'))).toBe('bad value');
    });

    it('should pass strings through with context', () => {
        expect(formatError('Plain string error', 'SuggestField')).toBe('SuggestField: Plain string error');
    });

    it('should return a generic message for unknown values', () => {
        expect(formatError(null)).toBe('An unexpected error occurred');
        expect(formatError(42)).toBe('An unexpected error occurred');
        expect(formatError({})).toBe('An unexpected error occurred');
    });

    it('should truncate very long messages', () => {
        const result = formatError('x'.repeat(600));
        expect(result).toBe('x'.repeat(500) + '...');
    });
});
