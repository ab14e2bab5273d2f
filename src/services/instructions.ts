import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import {
    DEFAULT_BRANCH,
    DEFAULT_REPO_NAME,
    DOCS_FILE,
    GITHUB_NEW_REPO_URL,
    PRESENTATION_PASSWORD,
    REMOTE_NAME,
    VERCEL_NEW_PROJECT_URL,
    githubRepoUrl,
    vercelSiteUrl
} from '../utils/config.js';
import type { RunConfig } from '../types/index.js';

function heading(title: string): void {
    console.log('');
    console.log(chalk.magenta.bold(`  ${title}`));
    console.log(chalk.gray('  ' + '─'.repeat(title.length)));
}

export function showUsage(): void {
    logger.lines(
        'info',
        'Usage: showcase-publish [options]',
        '',
        'Prepares the current directory for publishing: initializes git, writes a',
        '.gitignore, commits everything, creates the GitHub repository (with the',
        'GitHub CLI when available) and explains how to deploy it on Vercel.',
        '',
        'Options:',
        '  -u, --username <identity>  GitHub username (prompted when omitted)',
        `  -r, --repo <name>          repository name (default: "${DEFAULT_REPO_NAME}")`,
        '  -V, --version              print the version',
        '  -h, --help                 show this help',
        '',
        'Example:',
        '  showcase-publish --username octocat --repo my-showcase'
    );
}

export function showManualGitHubInstructions({ username, repoName }: RunConfig): void {
    const repoUrl = githubRepoUrl(username, repoName);

    heading('Create the GitHub repository manually');
    logger.lines(
        'info',
        `  1. Open ${GITHUB_NEW_REPO_URL}`,
        `  2. Repository name: ${repoName}`,
        '  3. Visibility: Public',
        '  4. Leave "Add a README", ".gitignore" and "license" unchecked',
        '  5. Click "Create repository"',
        '  6. Back here, link and push the local repository:',
        ''
    );
    logger.lines(
        'success',
        `     git remote add ${REMOTE_NAME} ${repoUrl}.git`,
        `     git branch -M ${DEFAULT_BRANCH}`,
        `     git push -u ${REMOTE_NAME} ${DEFAULT_BRANCH}`
    );
    console.log('');
    logger.lines('info', `  Your repository will be at ${repoUrl}`);
}

export function showVercelInstructions({ repoName }: RunConfig): void {
    heading('Deploy on Vercel');
    logger.lines(
        'info',
        `  1. Open ${VERCEL_NEW_PROJECT_URL} and sign in with GitHub`,
        `  2. Under "Import Git Repository", pick ${repoName} and click "Import"`,
        '  3. Configure the project:',
        '       Framework Preset:  Other',
        '       Root Directory:    ./',
        '       Build Command:     (leave empty)',
        '       Output Directory:  (leave empty, the site is served from the repository root)',
        '       Install Command:   (leave empty)',
        '  4. Click "Deploy"',
        '',
        `  The site will be live at ${vercelSiteUrl(repoName)}`,
        `  Every push to ${DEFAULT_BRANCH} redeploys it automatically.`
    );
}

export function showSummary({ username, repoName }: RunConfig): void {
    console.log('\n');
    logger.success('🎉 Setup complete!\n');

    console.log(chalk.gray('  📦 GitHub Repository:'));
    console.log(chalk.cyan.bold(`     ${githubRepoUrl(username, repoName)}\n`));

    console.log(chalk.gray('  🚀 Live Site:'));
    console.log(chalk.magenta.bold(`     ${vercelSiteUrl(repoName)}\n`));

    console.log(chalk.gray('  🔑 Presentation password:'));
    console.log(chalk.yellow.bold(`     ${PRESENTATION_PASSWORD}\n`));

    logger.lines(
        'info',
        '  Next steps:',
        '    • Finish the Vercel import if you have not yet',
        '    • Share the site URL and password with your audience',
        `    • See ${DOCS_FILE} for more details`
    );
    console.log('');
}
