import chalk, { type ChalkInstance } from 'chalk';
import figlet from 'figlet';
import ora, { type Ora } from 'ora';
import type { OutputCategory } from '../types/index.js';

const palette: Record<OutputCategory, ChalkInstance> = {
    success: chalk.green,
    info: chalk.blue,
    warning: chalk.yellow,
    error: chalk.red
};

export const logger = {
    info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
    success: (msg: string) => console.log(chalk.green('✔'), msg),
    error: (msg: string) => console.log(chalk.red('✖'), msg),
    warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
    lines: (category: OutputCategory, ...lines: string[]) => {
        for (const line of lines) {
            console.log(palette[category](line));
        }
    },
    banner: (title: string, subtitle: string) => {
        console.log('\n');
        console.log(chalk.cyan.bold(figlet.textSync(title, { font: 'Slant', horizontalLayout: 'default' })));
        console.log(chalk.gray(`  ${subtitle}`));
        console.log(chalk.gray('  ━'.repeat(25)));
        console.log('\n');
    },
    spinner: (text: string): Ora => ora(text).start()
};
