import { resolveInteractivity, supportsLevel } from '../interactivity';
import { InstallerArgs } from '../models';
import { createMockLogger } from './helpers/mocks';

describe('interactivity', () => {
    describe('supportsLevel', () => {
        it('should always support interactive', () => {
            expect(supportsLevel('interactive', undefined, {})).toBe(true);
        });

        it('should accept an empty template as support', () => {
            expect(supportsLevel('silent', undefined, { silent: '' })).toBe(true);
        });

        it('should accept a template declared only by the package', () => {
            expect(supportsLevel('passive', { passive: '/quiet' }, {})).toBe(true);
        });

        it('should reject a level neither side declares', () => {
            expect(supportsLevel('silent', { passive: '/quiet' }, { interactive: '' })).toBe(false);
        });
    });

    describe('resolveInteractivity', () => {
        const everything: InstallerArgs = { silent: '/S', passive: '/P', interactive: '' };

        it('should keep a supported level without logging', () => {
            const logger = createMockLogger();

            expect(resolveInteractivity('passive', undefined, everything, logger)).toBe('passive');
            expect(logger.info).not.toHaveBeenCalled();
            expect(logger.warn).not.toHaveBeenCalled();
        });

        it('should keep interactive even when nothing is declared', () => {
            const logger = createMockLogger();

            expect(resolveInteractivity('interactive', undefined, {}, logger)).toBe('interactive');
            expect(logger.warn).not.toHaveBeenCalled();
        });

        it('should switch silent to passive', () => {
            const logger = createMockLogger();

            const level = resolveInteractivity('silent', undefined, { passive: '/P' }, logger);

            expect(level).toBe('passive');
            expect(logger.info).toHaveBeenCalledWith('Silent install is not supported by installer. Switching to Passive');
        });

        it('should switch passive to silent', () => {
            const logger = createMockLogger();

            const level = resolveInteractivity('passive', undefined, { silent: '/S' }, logger);

            expect(level).toBe('silent');
            expect(logger.info).toHaveBeenCalledWith('Passive install is not supported by installer. Switching to Silent');
        });

        it('should fall back to interactive with a warning', () => {
            const logger = createMockLogger();

            const level = resolveInteractivity('silent', undefined, { interactive: '' }, logger);

            expect(level).toBe('interactive');
            expect(logger.warn).toHaveBeenCalledWith('Silent or Passive install is not supported by installer. Switching to Interactive');
        });

        it('should count package templates when the adapter has none', () => {
            const logger = createMockLogger();

            expect(resolveInteractivity('silent', { silent: '/quiet' }, {}, logger)).toBe('silent');
        });
    });
});
