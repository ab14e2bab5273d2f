import simpleGit, { type SimpleGit } from 'simple-git';
import { existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { COMMIT_MESSAGE, DEFAULT_BRANCH, GITIGNORE_FILE, GITIGNORE_TEMPLATE } from '../utils/config.js';

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class GitService {
    private git: SimpleGit;
    private workingDir: string;

    constructor(workingDir: string = process.cwd()) {
        this.workingDir = workingDir;
        this.git = simpleGit(workingDir);
    }

    isGitRepository(): boolean {
        return existsSync(join(this.workingDir, '.git'));
    }

    /**
     * Creates the repository on `main`. Returns false when one already
     * exists, in which case nothing is run.
     */
    async init(): Promise<boolean> {
        if (this.isGitRepository()) {
            logger.info('Git repository already initialized');
            return false;
        }

        const spinner = logger.spinner('⚙️  Initializing git repository...');

        try {
            await this.git.init();
            await this.git.raw(['branch', '-M', DEFAULT_BRANCH]);
            spinner.succeed(`Git repository initialized on ${chalk.cyan(DEFAULT_BRANCH)}`);
            return true;
        } catch (error) {
            spinner.fail('Failed to initialize git repository');
            throw new Error(`git init failed: ${errorMessage(error)}`);
        }
    }

    writeGitignore(): boolean {
        try {
            writeFileSync(join(this.workingDir, GITIGNORE_FILE), GITIGNORE_TEMPLATE, 'utf-8');
            logger.success(`Created ${GITIGNORE_FILE}`);
            return true;
        } catch (error) {
            logger.error(`Could not write ${GITIGNORE_FILE}: ${errorMessage(error)}`);
            return false;
        }
    }

    async commitAll(message: string = COMMIT_MESSAGE): Promise<void> {
        const spinner = logger.spinner('📁 Adding files...');

        try {
            await this.git.add('.');

            spinner.text = '💾 Creating initial commit...';
            await this.git.commit(message);

            spinner.succeed(`Committed: ${chalk.cyan(`"${message}"`)}`);
        } catch (error) {
            spinner.fail('Failed to commit files');
            logger.lines(
                'warning',
                '   Check that there is something to commit and that git knows who you are:',
                '     git config --global user.name "Your Name"',
                '     git config --global user.email "you@example.com"'
            );
            throw new Error(`git commit failed: ${errorMessage(error)}`);
        }
    }
}
