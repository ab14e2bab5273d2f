import { execFileSync } from 'node:child_process';
import simpleGit from 'simple-git';
import { logger } from '../utils/logger.js';
import { GH_DOWNLOAD_URL, GIT_DOWNLOAD_URL } from '../utils/config.js';
import type { Prerequisites, ToolStatus } from '../types/index.js';

export class PrerequisiteChecker {
    private workingDir: string;

    constructor(workingDir: string = process.cwd()) {
        this.workingDir = workingDir;
    }

    async check(): Promise<Prerequisites> {
        const git = await this.checkGit();
        if (git.available) {
            logger.success(`Git found: ${git.version}`);
        } else {
            logger.error('Git is not installed or not on your PATH');
            logger.lines('warning', `   Install it from ${GIT_DOWNLOAD_URL} and run this again.`);
        }

        const gh = this.checkGitHubCli();
        if (gh.available) {
            logger.success(`GitHub CLI found: ${gh.version}`);
        } else {
            logger.warn('GitHub CLI not found, the GitHub repository will have to be created manually');
            logger.lines('info', `   Get it from ${GH_DOWNLOAD_URL} to automate this step next time.`);
        }

        return { git, gh };
    }

    async checkGit(): Promise<ToolStatus> {
        try {
            const version = await simpleGit(this.workingDir).version();
            if (!version.installed) {
                return { available: false };
            }
            return { available: true, version: `${version.major}.${version.minor}.${version.patch}` };
        } catch {
            return { available: false };
        }
    }

    checkGitHubCli(): ToolStatus {
        try {
            const output = execFileSync('gh', ['--version'], { encoding: 'utf-8', stdio: 'pipe' });
            const [firstLine = ''] = output.trim().split('\n');
            return { available: true, version: firstLine.trim() };
        } catch {
            return { available: false };
        }
    }
}
