import chalk from 'chalk';
import { PrerequisiteChecker } from '../services/prerequisites.js';
import { GitService } from '../services/git.js';
import { GitHubService } from '../services/github.js';
import {
    showManualGitHubInstructions,
    showSummary,
    showUsage,
    showVercelInstructions
} from '../services/instructions.js';
import { askUsername, waitForKeypress } from '../utils/prompt.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_REPO_NAME } from '../utils/config.js';
import type { Prerequisites, RunConfig, SetupOptions, ToolStatus } from '../types/index.js';

export interface SetupDependencies {
    checkPrerequisites: () => Promise<Prerequisites>;
    createGit: () => Pick<GitService, 'init' | 'writeGitignore' | 'commitAll'>;
    createGitHub: (cli: ToolStatus) => Pick<GitHubService, 'createRepository'>;
    askUsername: () => Promise<string>;
    waitForKeypress: () => Promise<void>;
}

export function defaultDependencies(workingDir: string = process.cwd()): SetupDependencies {
    return {
        checkPrerequisites: () => new PrerequisiteChecker(workingDir).check(),
        createGit: () => new GitService(workingDir),
        createGitHub: (cli) => new GitHubService(cli, workingDir),
        askUsername,
        waitForKeypress: () => waitForKeypress()
    };
}

/**
 * Runs the whole publishing setup and resolves with the process exit code.
 * Fatal steps throw; anything thrown ends the run with 1.
 */
export async function runSetup(options: SetupOptions, deps: SetupDependencies): Promise<number> {
    logger.banner('SHOWCASE', '🚀 Publish a static site to GitHub & Vercel');

    if (options.help) {
        showUsage();
        return 0;
    }

    try {
        let username = options.username?.trim() ?? '';
        if (!username) {
            username = await deps.askUsername();
        }
        if (!username) {
            logger.error('A GitHub username is required');
            return 1;
        }

        const config: RunConfig = {
            username,
            repoName: options.repo?.trim() || DEFAULT_REPO_NAME
        };
        logger.info(`Repository: ${chalk.cyan(`${config.username}/${config.repoName}`)}`);
        console.log('');

        const prerequisites = await deps.checkPrerequisites();
        if (!prerequisites.git.available) {
            return 1;
        }
        console.log('');

        const git = deps.createGit();
        await git.init();
        git.writeGitignore();
        await git.commitAll();
        console.log('');

        const created = deps.createGitHub(prerequisites.gh).createRepository(config.repoName);
        if (!created) {
            showManualGitHubInstructions(config);
            await deps.waitForKeypress();
        }

        showVercelInstructions(config);
        showSummary(config);
        return 0;
    } catch (error) {
        logger.error(error instanceof Error ? error.message : 'An error occurred');
        return 1;
    }
}

export async function setupCommand(options: SetupOptions): Promise<void> {
    const code = await runSetup(options, defaultDependencies());
    process.exit(code);
}
