import { componentLogger, getLogger, initLogger } from '../utils/logger.js';

describe('logger', () => {
    afterEach(() => {
        initLogger({ level: 'silent' });
    });

    it('should pick up the level from PREDIGRAPH_LOG_LEVEL', () => {
        expect(getLogger().level).toBe('silent');
    });

    it('should honour an explicit level with JSON output', () => {
        const logger = initLogger({ level: 'debug', jsonLogs: true });
        expect(logger.level).toBe('debug');
        expect(getLogger()).toBe(logger);
    });

    it('should tag child loggers with their component', () => {
        initLogger({ level: 'warn', jsonLogs: true });
        const child = componentLogger('resolver');
        expect(child.bindings()).toEqual({ component: 'resolver' });
        expect(child.level).toBe('warn');
    });
});
