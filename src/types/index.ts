export interface SetupOptions {
    username?: string;
    repo?: string;
    help?: boolean;
}

export interface RunConfig {
    username: string;
    repoName: string;
}

export interface ToolStatus {
    available: boolean;
    version?: string;
}

export interface Prerequisites {
    git: ToolStatus;
    gh: ToolStatus;
}

export type OutputCategory = 'success' | 'info' | 'warning' | 'error';
