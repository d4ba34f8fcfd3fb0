import { applyLogPath, buildArguments, levelArguments, loggingTemplate } from '../arguments';

describe('arguments', () => {
    describe('levelArguments', () => {
        it('should put adapter arguments before package arguments', () => {
            expect(levelArguments('silent', { silent: 'ADDLOCAL=ALL' }, { silent: '/qn' })).toBe('/qn ADDLOCAL=ALL');
        });

        it('should trim when one side is missing', () => {
            expect(levelArguments('silent', undefined, { silent: '/S' })).toBe('/S');
            expect(levelArguments('silent', { silent: '/S' }, {})).toBe('/S');
        });

        it('should return an empty string when nothing is declared', () => {
            expect(levelArguments('interactive', undefined, {})).toBe('');
        });
    });

    describe('loggingTemplate', () => {
        it('should prefer the package template', () => {
            expect(loggingTemplate({ log: '/L {path}' }, { log: '/LOG={path}' })).toBe('/L {path}');
        });

        it('should fall back to the adapter template', () => {
            expect(loggingTemplate(undefined, { log: '/LOG={path}' })).toBe('/LOG={path}');
        });
    });

    describe('applyLogPath', () => {
        it('should quote the path in place of every placeholder', () => {
            expect(applyLogPath('/LOG={path}', 'C:\\Logs\\a.log')).toBe('/LOG="C:\\Logs\\a.log"');
        });
    });

    describe('buildArguments', () => {
        it('should not resolve a log path without a logging template', () => {
            const resolveLogPath = jest.fn(() => 'C:\\Logs\\a.log');

            const built = buildArguments('silent', undefined, { silent: '/S' }, resolveLogPath);

            expect(built).toEqual({ args: '/S' });
            expect(resolveLogPath).not.toHaveBeenCalled();
        });

        it('should append the logging arguments and report the path', () => {
            const built = buildArguments(
                'silent',
                { silent: '/MERGETASKS=!desktopicon' },
                { silent: '/VERYSILENT', log: '/LOG={path}' },
                () => 'C:\\Logs\\app.log',
            );

            expect(built).toEqual({
                args: '/VERYSILENT /MERGETASKS=!desktopicon /LOG="C:\\Logs\\app.log"',
                logPath: 'C:\\Logs\\app.log',
            });
        });

        it('should not leave a leading space when the level has no arguments', () => {
            const built = buildArguments('interactive', undefined, { interactive: '', log: '/l*v {path}' }, () => 'x.log');

            expect(built.args).toBe('/l*v "x.log"');
        });
    });
});
