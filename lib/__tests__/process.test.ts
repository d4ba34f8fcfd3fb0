import { InstallerTerminatedError, LaunchFailureError } from '../errors';
import { runProcess, toLaunchFailure } from '../process';
import { createMockLogger, createMockProcessController, FakeProcess, spawnError } from './helpers/mocks';

describe('process', () => {
    describe('toLaunchFailure', () => {
        it('should explain a missing executable', () => {
            const error = toLaunchFailure('C:\\setup.exe', spawnError('ENOENT', 'spawn C:\\setup.exe ENOENT'));

            expect(error).toBeInstanceOf(LaunchFailureError);
            expect(error.code).toBe('ENOENT');
            expect(error.message).toBe('Executable not found: C:\\setup.exe. The installer may have been moved or deleted.');
        });

        it('should explain access denied', () => {
            const error = toLaunchFailure('C:\\setup.exe', spawnError('EACCES', 'denied'));

            expect(error.message).toBe('Access denied starting C:\\setup.exe. This may require administrator privileges. (Original error: denied)');
        });

        it('should keep the original message for other errors', () => {
            const error = toLaunchFailure('C:\\setup.exe', new Error('boom'));

            expect(error.message).toBe('Failed to start C:\\setup.exe: boom');
            expect(error.code).toBeUndefined();
        });
    });

    describe('runProcess', () => {
        it('should pass the argument string verbatim and resolve with the exit code', async () => {
            const controller = createMockProcessController(3);
            const logger = createMockLogger();

            const code = await runProcess('C:\\setup.exe', '/S /D=C:\\Program Files\\App', {}, controller, logger);

            expect(code).toBe(3);
            expect(controller.start).toHaveBeenCalledWith('C:\\setup.exe', ['/S /D=C:\\Program Files\\App'], {
                stdio: 'ignore',
                shell: false,
                windowsVerbatimArguments: true,
            });
            expect(logger.info).toHaveBeenCalledWith('Waiting for installation to complete ...');
        });

        it('should keep quoted property values intact', async () => {
            const controller = createMockProcessController(0);

            await runProcess('msiexec.exe', '/i "C:\\Temp\\app.msi" /qn INSTALLDIR="C:\\Program Files\\Foo"', {}, controller, createMockLogger());

            expect(controller.start.mock.calls[0][1]).toEqual(['/i "C:\\Temp\\app.msi" /qn INSTALLDIR="C:\\Program Files\\Foo"']);
        });

        it('should start without arguments for an empty string', async () => {
            const controller = createMockProcessController(0);

            await runProcess('C:\\setup.exe', '', {}, controller, createMockLogger());

            expect(controller.start.mock.calls[0][1]).toEqual([]);
        });

        it('should reject with a launch failure when the process emits an error', async () => {
            const controller = createMockProcessController();
            controller.start.mockImplementation(() => new FakeProcess().failWith(spawnError('ENOENT', 'not found')));

            await expect(runProcess('C:\\missing.exe', '', {}, controller, createMockLogger()))
                .rejects.toBeInstanceOf(LaunchFailureError);
        });

        it('should reject with a launch failure when spawn throws', async () => {
            const controller = createMockProcessController();
            const logger = createMockLogger();
            controller.start.mockImplementation(() => {
                throw spawnError('EPERM', 'operation not permitted');
            });

            await expect(runProcess('C:\\setup.exe', '', {}, controller, logger)).rejects.toMatchObject({
                kind: 'launch-failure',
                code: 'EPERM',
            });
            expect(logger.info).not.toHaveBeenCalled();
        });

        it('should reject when the process is killed by a signal', async () => {
            const controller = createMockProcessController();
            controller.start.mockImplementation(() => new FakeProcess().exitWith(null, 'SIGTERM'));

            const run = runProcess('C:\\setup.exe', '', {}, controller, createMockLogger());

            await expect(run).rejects.toBeInstanceOf(InstallerTerminatedError);
            await expect(run).rejects.toThrow('C:\\setup.exe was terminated by signal SIGTERM');
        });

        it('should ignore an error emitted after the process closed', async () => {
            const child = new FakeProcess();
            const controller = createMockProcessController();
            controller.start.mockReturnValue(child);

            const run = runProcess('C:\\setup.exe', '', {}, controller, createMockLogger());
            child.emit('close', 0, null);
            child.emit('error', new Error('late'));

            await expect(run).resolves.toBe(0);
        });

        describe('progress', () => {
            beforeEach(() => {
                jest.useFakeTimers();
            });

            afterEach(() => {
                jest.useRealTimers();
            });

            it('should report elapsed time while the process runs and stop after it exits', async () => {
                const child = new FakeProcess();
                const controller = createMockProcessController();
                controller.start.mockReturnValue(child);
                const onProgress = jest.fn();

                const run = runProcess('C:\\setup.exe', '', { onProgress }, controller, createMockLogger());
                jest.advanceTimersByTime(250);
                child.emit('close', 0, null);
                jest.advanceTimersByTime(500);

                await expect(run).resolves.toBe(0);
                expect(onProgress).toHaveBeenCalledTimes(2);
                expect(onProgress).toHaveBeenNthCalledWith(1, 100);
                expect(onProgress).toHaveBeenNthCalledWith(2, 200);
            });
        });
    });
});
