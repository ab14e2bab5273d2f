import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node:child_process', () => ({ execFileSync: vi.fn() }));

import { execFileSync } from 'node:child_process';
import { GitHubService } from '../src/services/github.js';

const execMock = vi.mocked(execFileSync);

describe('GitHubService.createRepository', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.clearAllMocks();
    });

    it('fails without running gh when the CLI is unavailable', () => {
        const service = new GitHubService({ available: false });

        expect(service.createRepository('demo')).toBe(false);
        expect(execMock).not.toHaveBeenCalled();
    });

    it('creates a public repository and pushes in one call', () => {
        execMock.mockReturnValue('');
        const service = new GitHubService({ available: true, version: 'gh version 2.40.1' }, '/work/site');

        expect(service.createRepository('demo')).toBe(true);
        expect(execMock).toHaveBeenCalledTimes(1);
        expect(execMock).toHaveBeenCalledWith(
            'gh',
            ['repo', 'create', 'demo', '--public', '--source=.', '--remote=origin', '--push'],
            { cwd: '/work/site', stdio: 'inherit' }
        );
    });

    it('reports failure when gh exits non-zero', () => {
        execMock.mockImplementation(() => {
            throw new Error('Command failed: gh repo create demo');
        });
        const service = new GitHubService({ available: true });

        expect(service.createRepository('demo')).toBe(false);
        expect(execMock).toHaveBeenCalledTimes(1);
    });
});
