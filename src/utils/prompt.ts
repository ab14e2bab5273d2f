import inquirer from 'inquirer';
import chalk from 'chalk';
import type { Readable } from 'node:stream';

export async function askUsername(): Promise<string> {
    const { username } = await inquirer.prompt<{ username: string }>([
        {
            type: 'input',
            name: 'username',
            message: 'GitHub username:'
        }
    ]);

    return username.trim();
}

export type KeypressInput = Readable & {
    isTTY?: boolean;
    isRaw?: boolean;
    setRawMode?: (mode: boolean) => unknown;
};

/**
 * Blocks until the operator presses any key. Without a TTY the first chunk
 * of input (or end of input) resumes instead, including input that already
 * ended before the wait started.
 */
export function waitForKeypress(
    message: string = 'Press any key to continue...',
    input: KeypressInput = process.stdin
): Promise<void> {
    console.log(chalk.yellow.bold(`\n  ⚡ ${message}\n`));

    if (input.readableEnded || input.destroyed) {
        return Promise.resolve();
    }

    return new Promise((resolve) => {
        const raw = input.isTTY === true && input.setRawMode !== undefined;
        const wasRaw = input.isRaw === true;

        const finish = (chunk?: Buffer | string) => {
            input.off('data', finish);
            input.off('end', finish);
            if (raw) {
                input.setRawMode?.(wasRaw);
            }
            input.pause();

            if (chunk !== undefined && chunk.toString() === '\u0003') {
                process.kill(process.pid, 'SIGINT');
                return;
            }
            resolve();
        };

        if (raw) {
            input.setRawMode?.(true);
        }
        input.on('data', finish);
        input.on('end', finish);
        input.resume();
    });
}
