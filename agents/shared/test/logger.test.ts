import { Logger, initLogger, getLogger } from '../src/logger';

describe('Logger', () => {
    it('should create a logger with default options', () => {
        const logger = new Logger({ service: 'test-service' });
        expect(logger.getWinstonLogger().level).toBe('debug');
    });

    it('should default to info in production', () => {
        const logger = new Logger({ service: 'test-service', environment: 'production', silent: true });
        expect(logger.getWinstonLogger().level).toBe('info');
    });

    it('should return the logger registered by initLogger', () => {
        const initialized = initLogger({ service: 'singleton-service', silent: true });
        expect(getLogger()).toBe(initialized);
        expect(getLogger()).toBe(getLogger());
    });

    it('should tag child loggers with their component', () => {
        const logger = new Logger({ service: 'test-service', silent: true });
        const winstonChild = vi.spyOn(logger.getWinstonLogger(), 'child');

        logger.child('store');

        expect(winstonChild).toHaveBeenCalledWith({ component: 'store' });
    });

    it('should forward metadata to winston', () => {
        const logger = new Logger({ service: 'test-service', silent: true });
        const info = vi.spyOn(logger.getWinstonLogger(), 'info');

        logger.info('Job submitted', { jobId: 'job-1' });

        expect(info).toHaveBeenCalledWith('Job submitted', { jobId: 'job-1' });
    });

    it('should not write anything when silent', () => {
        const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
        const logger = new Logger({ service: 'test-service', environment: 'test', silent: true });

        logger.info('Test info');
        logger.error('Test error');

        expect(write).not.toHaveBeenCalled();
        write.mockRestore();
    });
});
