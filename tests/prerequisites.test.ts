import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const gitMock = vi.hoisted(() => ({ version: vi.fn() }));

vi.mock('simple-git', () => ({ default: vi.fn(() => gitMock) }));
vi.mock('node:child_process', () => ({ execFileSync: vi.fn() }));

import { execFileSync } from 'node:child_process';
import { PrerequisiteChecker } from '../src/services/prerequisites.js';

const execMock = vi.mocked(execFileSync);

describe('PrerequisiteChecker', () => {
    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
        vi.clearAllMocks();
    });

    it('reports the installed git version', async () => {
        gitMock.version.mockResolvedValue({ installed: true, major: 2, minor: 43, patch: 0, agent: 'git' });

        expect(await new PrerequisiteChecker().checkGit()).toEqual({ available: true, version: '2.43.0' });
    });

    it('reports git as unavailable when it is not installed', async () => {
        gitMock.version.mockResolvedValue({ installed: false, major: 0, minor: 0, patch: 0, agent: '' });

        expect(await new PrerequisiteChecker().checkGit()).toEqual({ available: false });
    });

    it('reports git as unavailable when the version query throws', async () => {
        gitMock.version.mockRejectedValue(new Error('spawn git ENOENT'));

        expect(await new PrerequisiteChecker().checkGit()).toEqual({ available: false });
    });

    it('reads the first line of gh --version', () => {
        execMock.mockReturnValue('gh version 2.40.1 (2023-12-13)\nhttps://github.com/cli/cli/releases/tag/v2.40.1\n');

        expect(new PrerequisiteChecker().checkGitHubCli()).toEqual({
            available: true,
            version: 'gh version 2.40.1 (2023-12-13)'
        });
        expect(execMock).toHaveBeenCalledWith('gh', ['--version'], { encoding: 'utf-8', stdio: 'pipe' });
    });

    it('reports gh as unavailable when it cannot be run', () => {
        execMock.mockImplementation(() => {
            throw new Error('spawnSync gh ENOENT');
        });

        expect(new PrerequisiteChecker().checkGitHubCli()).toEqual({ available: false });
    });

    it('checks both tools', async () => {
        gitMock.version.mockResolvedValue({ installed: true, major: 2, minor: 39, patch: 2, agent: 'git' });
        execMock.mockImplementation(() => {
            throw new Error('spawnSync gh ENOENT');
        });

        expect(await new PrerequisiteChecker().check()).toEqual({
            git: { available: true, version: '2.39.2' },
            gh: { available: false }
        });
    });
});
