export const DEFAULT_REPO_NAME = 'ea-showcase';
export const DEFAULT_BRANCH = 'main';
export const REMOTE_NAME = 'origin';
export const COMMIT_MESSAGE = 'Initial commit: showcase site';
export const GITIGNORE_FILE = '.gitignore';

export const PRESENTATION_PASSWORD = 'showcase-preview';
export const DOCS_FILE = 'README.md';

export const GIT_DOWNLOAD_URL = 'https://git-scm.com/downloads';
export const GH_DOWNLOAD_URL = 'https://cli.github.com';
export const GITHUB_NEW_REPO_URL = 'https://github.com/new';
export const VERCEL_NEW_PROJECT_URL = 'https://vercel.com/new';

export function githubRepoUrl(username: string, repoName: string): string {
    return `https://github.com/${username}/${repoName}`;
}

export function vercelSiteUrl(repoName: string): string {
    return `https://${repoName}.vercel.app`;
}

// OS, editor, logs, temp, env, build, dependencies, backups
export const GITIGNORE_TEMPLATE = [
    '# OS files',
    '.DS_Store',
    'Thumbs.db',
    'desktop.ini',
    '',
    '# Editor files',
    '.vscode/',
    '.idea/',
    '*.swp',
    '*.swo',
    '*~',
    '',
    '# Logs',
    '*.log',
    'logs/',
    '',
    '# Temporary files',
    '*.tmp',
    '*.temp',
    'tmp/',
    'temp/',
    '',
    '# Environment files',
    '.env',
    '.env.local',
    '.env.*.local',
    '',
    '# Build output',
    'dist/',
    'build/',
    'out/',
    '',
    '# Dependencies',
    'node_modules/',
    '',
    '# Backups',
    '*.bak',
    '*.backup',
    '*.old',
    ''
].join('\n');
