import * as path from 'path';
import { errorMessage, LogFolderError } from './errors';
import { IPathResolver } from './interfaces/collaborator-interfaces';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';

export class PathResolver implements IPathResolver {
    constructor(
        readonly tempFolder: string,
        private readonly logFolder: string,
        private readonly fileSystem: IFileSystem = new NodeFileSystem(),
        private readonly now: () => Date = () => new Date(),
    ) {}

    /**
     * A fresh log file path per run, e.g. `sample-tool_2024-05-01T10-00-00-000Z.log`
     */
    installerLogFile(packageId: string): string {
        if (!this.fileSystem.existsSync(this.logFolder)) {
            try {
                this.fileSystem.mkdirSync(this.logFolder, { recursive: true });
            } catch (error) {
                throw new LogFolderError(this.logFolder, errorMessage(error));
            }
        }

        const safeId = packageId.replace(/[^\w.-]+/g, '_');
        const stamp = this.now().toISOString().replace(/[:.]/g, '-');
        return path.join(this.logFolder, `${safeId}_${stamp}.log`);
    }
}
