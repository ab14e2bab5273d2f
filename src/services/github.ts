import { execFileSync } from 'node:child_process';
import { logger } from '../utils/logger.js';
import { REMOTE_NAME } from '../utils/config.js';
import type { ToolStatus } from '../types/index.js';

export class GitHubService {
    private cli: ToolStatus;
    private workingDir: string;

    constructor(cli: ToolStatus, workingDir: string = process.cwd()) {
        this.cli = cli;
        this.workingDir = workingDir;
    }

    /**
     * Creates a public repository from the working directory and pushes to it
     * in a single `gh repo create` call. A repository that was created but
     * not pushed still counts as a failure.
     */
    createRepository(repoName: string): boolean {
        if (!this.cli.available) {
            logger.warn('GitHub CLI unavailable, skipping automatic repository creation');
            return false;
        }

        logger.info(`Creating GitHub repository ${repoName}...`);

        try {
            execFileSync(
                'gh',
                ['repo', 'create', repoName, '--public', '--source=.', `--remote=${REMOTE_NAME}`, '--push'],
                { cwd: this.workingDir, stdio: 'inherit' }
            );
            logger.success('Repository created and code pushed to GitHub');
            return true;
        } catch {
            logger.warn('Automatic repository creation failed, falling back to manual setup');
            return false;
        }
    }
}
