import * as path from 'path';
import { createHash } from 'crypto';
import { Readable, Writable } from 'stream';
import { IntegrityError, TransferError } from '../errors';
import { IFileSystem } from '../interfaces/fs-interface';
import { IProgressBar } from '../interfaces/progress-interface';
import { HttpTransferService, installerFileName } from '../transfer';
import { createMockLogger } from './helpers/mocks';

/**
 * File system kept in memory so downloads can be checked byte for byte
 */
class MemoryFileSystem implements IFileSystem {
    readonly files = new Map<string, Buffer>();
    readonly dirs = new Set<string>();

    existsSync(filePath: string): boolean {
        return this.files.has(filePath) || this.dirs.has(filePath);
    }

    mkdirSync(dirPath: string): void {
        this.dirs.add(dirPath);
    }

    unlinkSync(filePath: string): void {
        this.files.delete(filePath);
    }

    createWriteStream(filePath: string): NodeJS.WritableStream {
        const chunks: Buffer[] = [];
        return new Writable({
            write: (chunk: Buffer, _encoding, callback) => {
                chunks.push(Buffer.from(chunk));
                callback();
            },
            final: (callback) => {
                this.files.set(filePath, Buffer.concat(chunks));
                callback();
            },
        });
    }

    createReadStream(filePath: string): NodeJS.ReadableStream {
        return Readable.from([this.files.get(filePath) ?? Buffer.alloc(0)]);
    }
}

const CONTENT = Buffer.from('installer-bytes');
const CONTENT_SHA256 = createHash('sha256').update(CONTENT).digest('hex');
const DOWNLOAD_URL = 'https://downloads.example.com/app/setup.exe';
const DOWNLOAD_DIR = '/tmp/downloads';

function createHttpClient(body: Buffer = CONTENT) {
    return {
        request: jest.fn().mockImplementation(async () => ({
            data: Readable.from([body]),
            headers: { 'content-length': String(body.length) },
            status: 200,
            statusText: 'OK',
            config: {},
        })),
    };
}

function createBar(): IProgressBar & { setTotal: jest.Mock; update: jest.Mock; stop: jest.Mock } {
    return { setTotal: jest.fn(), update: jest.fn(), stop: jest.fn() };
}

describe('transfer', () => {
    describe('installerFileName', () => {
        it('should take the decoded last path segment', () => {
            expect(installerFileName('https://downloads.example.com/app/Sample%20Setup.exe?token=x')).toBe('Sample Setup.exe');
        });

        it('should fall back to a default name', () => {
            expect(installerFileName('https://downloads.example.com/')).toBe('installer.exe');
        });
    });

    describe('HttpTransferService', () => {
        let fileSystem: MemoryFileSystem;

        beforeEach(() => {
            fileSystem = new MemoryFileSystem();
        });

        it('should download and verify an installer', async () => {
            const httpClient = createHttpClient();
            const bar = createBar();
            const logger = createMockLogger();
            const service = new HttpTransferService({
                fileSystem,
                httpClient,
                logger,
                progressBarFactory: { createBar: jest.fn(() => bar) },
            });

            const installerPath = await service.fetch(DOWNLOAD_URL, DOWNLOAD_DIR, CONTENT_SHA256.toUpperCase());

            expect(installerPath).toBe(path.join(DOWNLOAD_DIR, 'setup.exe'));
            expect(fileSystem.files.get(installerPath)).toEqual(CONTENT);
            expect(fileSystem.dirs.has(DOWNLOAD_DIR)).toBe(true);
            expect(httpClient.request).toHaveBeenCalledWith({ method: 'GET', url: DOWNLOAD_URL, responseType: 'stream' });
            expect(logger.info).toHaveBeenCalledWith(`Downloading ${DOWNLOAD_URL}`);
            expect(bar.setTotal).toHaveBeenCalledWith(15);
            expect(bar.update).toHaveBeenLastCalledWith(15);
            expect(bar.stop).toHaveBeenCalled();
        });

        it('should discard a download whose checksum does not match', async () => {
            const service = new HttpTransferService({ fileSystem, httpClient: createHttpClient(), logger: createMockLogger() });

            const fetch = service.fetch(DOWNLOAD_URL, DOWNLOAD_DIR, '0'.repeat(64));

            await expect(fetch).rejects.toBeInstanceOf(IntegrityError);
            await expect(fetch).rejects.toMatchObject({ expected: '0'.repeat(64), actual: CONTENT_SHA256 });
            expect(fileSystem.files.size).toBe(0);
        });

        it('should wrap request failures', async () => {
            const httpClient = createHttpClient();
            httpClient.request.mockRejectedValue(new Error('Network Error'));
            const service = new HttpTransferService({ fileSystem, httpClient, logger: createMockLogger() });

            const fetch = service.fetch(DOWNLOAD_URL, DOWNLOAD_DIR, CONTENT_SHA256);

            await expect(fetch).rejects.toBeInstanceOf(TransferError);
            await expect(fetch).rejects.toThrow(`Failed to download ${DOWNLOAD_URL}: Network Error`);
        });

        it('should verify a local installer in place', async () => {
            const httpClient = createHttpClient();
            fileSystem.files.set('/srv/installers/app.exe', CONTENT);
            const service = new HttpTransferService({ fileSystem, httpClient, logger: createMockLogger() });

            await expect(service.fetch('/srv/installers/app.exe', DOWNLOAD_DIR, CONTENT_SHA256)).resolves.toBe('/srv/installers/app.exe');
            expect(httpClient.request).not.toHaveBeenCalled();
        });

        it('should keep a local installer that fails verification', async () => {
            fileSystem.files.set('/srv/installers/app.exe', CONTENT);
            const service = new HttpTransferService({ fileSystem, httpClient: createHttpClient(), logger: createMockLogger() });

            await expect(service.fetch('/srv/installers/app.exe', DOWNLOAD_DIR, 'f'.repeat(64))).rejects.toBeInstanceOf(IntegrityError);
            expect(fileSystem.files.has('/srv/installers/app.exe')).toBe(true);
        });

        it('should report a missing local installer', async () => {
            const service = new HttpTransferService({ fileSystem, httpClient: createHttpClient(), logger: createMockLogger() });

            await expect(service.fetch('/srv/installers/missing.exe', DOWNLOAD_DIR, CONTENT_SHA256))
                .rejects.toThrow('Failed to download /srv/installers/missing.exe: file does not exist');
        });
    });
});
