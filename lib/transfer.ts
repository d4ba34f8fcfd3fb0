import * as path from 'path';
import { createHash } from 'crypto';
import { errorMessage, IntegrityError, InstallerError, TransferError } from './errors';
import { ITransferService } from './interfaces/collaborator-interfaces';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { AxiosHttpClient, IHttpClient } from './interfaces/http-interface';
import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { IProgressBarFactory } from './interfaces/progress-interface';
import { TransferProgress } from './models';

export type TransferServiceOptions = {
    fileSystem?: IFileSystem;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
    logger?: ILogger;
}

function isRemote(location: string): boolean {
    return /^https?:\/\//i.test(location);
}

/**
 * File name for a downloaded installer, taken from the URL path
 */
export function installerFileName(location: string): string {
    const pathname = new URL(location).pathname;
    const name = decodeURIComponent(path.posix.basename(pathname));
    return name || 'installer.exe';
}

/**
 * Downloads installers over HTTP and verifies their SHA-256.
 * Local paths are verified in place.
 */
export class HttpTransferService implements ITransferService {
    private readonly fileSystem: IFileSystem;
    private readonly httpClient: IHttpClient;
    private readonly progressBarFactory?: IProgressBarFactory;
    private readonly logger: ILogger;

    constructor(options: TransferServiceOptions = {}) {
        this.fileSystem = options.fileSystem || new NodeFileSystem();
        this.httpClient = options.httpClient || new AxiosHttpClient();
        this.progressBarFactory = options.progressBarFactory;
        this.logger = options.logger || new ConsoleLogger();
    }

    async fetch(location: string, destinationDir: string, expectedSha256: string): Promise<string> {
        if (!isRemote(location)) {
            if (!this.fileSystem.existsSync(location)) {
                throw new TransferError(location, 'file does not exist');
            }
            await this.verify(location, location, expectedSha256, false);
            return location;
        }

        if (!this.fileSystem.existsSync(destinationDir)) {
            this.fileSystem.mkdirSync(destinationDir, { recursive: true });
        }

        const outputPath = path.join(destinationDir, installerFileName(location));
        this.logger.info(`Downloading ${location}`);

        const bar = this.progressBarFactory?.createBar(path.basename(outputPath));
        try {
            await this.download(location, outputPath, (progress) => {
                if (bar && progress.total > 0) {
                    bar.setTotal(progress.total);
                    bar.update(progress.loaded);
                }
            });
        } catch (error) {
            this.discard(outputPath);
            if (error instanceof InstallerError) throw error;
            throw new TransferError(location, errorMessage(error));
        } finally {
            bar?.stop();
        }

        await this.verify(location, outputPath, expectedSha256, true);
        return outputPath;
    }

    private async download(
        url: string,
        outputPath: string,
        onProgress: (progress: TransferProgress) => void,
    ): Promise<void> {
        const response = await this.httpClient.request<NodeJS.ReadableStream>({
            method: 'GET',
            url,
            responseType: 'stream',
        });

        const total = parseInt(String(response.headers['content-length'] ?? '0'), 10) || 0;
        let loaded = 0;
        const writer = this.fileSystem.createWriteStream(outputPath);

        return new Promise((resolve, reject) => {
            response.data.on('data', (chunk: Buffer) => {
                loaded += chunk.length;
                onProgress({ loaded, total });
            });
            response.data.on('error', reject);
            writer.on('finish', () => resolve());
            writer.on('error', reject);
            response.data.pipe(writer);
        });
    }

    private async verify(location: string, filePath: string, expectedSha256: string, removeOnMismatch: boolean): Promise<void> {
        const actual = await this.checksum(filePath);
        if (actual.toLowerCase() === expectedSha256.toLowerCase()) {
            return;
        }
        if (removeOnMismatch) {
            this.discard(filePath);
        }
        throw new IntegrityError(location, expectedSha256.toLowerCase(), actual);
    }

    private checksum(filePath: string): Promise<string> {
        return new Promise((resolve, reject) => {
            const hash = createHash('sha256');
            const stream = this.fileSystem.createReadStream(filePath);
            stream.on('data', (chunk: Buffer | string) => hash.update(chunk));
            stream.on('end', () => resolve(hash.digest('hex')));
            stream.on('error', reject);
        });
    }

    private discard(filePath: string): void {
        try {
            if (this.fileSystem.existsSync(filePath)) {
                this.fileSystem.unlinkSync(filePath);
            }
        } catch (error) {
            this.logger.warn(`Could not remove ${filePath}: ${errorMessage(error)}`);
        }
    }
}
