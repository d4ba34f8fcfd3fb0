import { runInstaller } from '../runner';
import { InitializedAdapter } from '../models';
import { createTestDependencies, FakeProcess } from './helpers/mocks';

describe('runInstaller', () => {
    const adapter: InitializedAdapter = {
        installMethod: 'nsis',
        args: { silent: '/S', interactive: '' },
        exitCodes: { 2: 'Installation aborted by script' },
        executablePath: 'C:\\Temp\\setup.exe',
    };

    it('should publish executing before starting the process', async () => {
        const deps = createTestDependencies();
        deps.processController.start.mockImplementation(() => {
            expect(deps.eventSink.types()).toEqual(['executing']);
            return new FakeProcess().exitWith(0);
        });

        await expect(runInstaller('silent', 'app', undefined, adapter, deps)).resolves.toEqual({ success: true, exitCode: 0 });
    });

    it('should not request a log file when the adapter cannot write one', async () => {
        const deps = createTestDependencies();

        await runInstaller('silent', 'app', { silent: '/D=C:\\App' }, adapter, deps);

        expect(deps.pathResolver.installerLogFile).not.toHaveBeenCalled();
        expect(deps.processController.start).toHaveBeenCalledWith('C:\\Temp\\setup.exe', ['/S /D=C:\\App'], {
            stdio: 'ignore',
            shell: false,
            windowsVerbatimArguments: true,
        });
    });

    it('should omit the reason of an unknown exit code', async () => {
        const deps = createTestDependencies();
        deps.processController.start.mockImplementation(() => new FakeProcess().exitWith(9));

        await expect(runInstaller('silent', 'app', undefined, adapter, deps)).rejects.toMatchObject({
            kind: 'execution-failure',
            exitCode: 9,
            reason: undefined,
            message: "Installer for 'app' failed with exit code 9",
        });
    });

    describe('progress', () => {
        beforeEach(() => {
            jest.useFakeTimers();
        });

        afterEach(() => {
            jest.useRealTimers();
        });

        it('should report progress with the package id', async () => {
            const deps = createTestDependencies();
            const child = new FakeProcess();
            deps.processController.start.mockReturnValue(child);
            const onProgress = jest.fn();
            deps.onProgress = onProgress;

            const run = runInstaller('silent', 'app', undefined, adapter, deps);
            jest.advanceTimersByTime(100);
            child.emit('close', 0, null);

            await run;
            expect(onProgress).toHaveBeenCalledWith('app', 100);
        });
    });
});
