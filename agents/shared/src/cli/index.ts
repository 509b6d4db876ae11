import { Command } from 'commander';
import chalk from 'chalk';

export type TableCell = string | number | boolean | null | undefined;

function cellText(cell: TableCell): string {
    return cell === null || cell === undefined ? '' : String(cell);
}

/**
 * Console helpers for the command-line entry points.
 */
export class CLIUtils {
    static createProgram(name: string, description: string, version: string = '1.0.0'): Command {
        const program = new Command();
        program
            .name(name)
            .description(description)
            .version(version);
        return program;
    }

    /** Prints `message...` and then Done or Failed once `action` settles. */
    static async withSpinner<T>(message: string, action: () => Promise<T>): Promise<T> {
        process.stdout.write(chalk.blue('ℹ') + ' ' + message + '... ');
        try {
            const result = await action();
            process.stdout.write(chalk.green('✔ Done\n'));
            return result;
        } catch (error) {
            process.stdout.write(chalk.red('✖ Failed\n'));
            throw error;
        }
    }

    static printTable(headers: string[], rows: TableCell[][]): void {
        if (rows.length === 0) {
            console.log(chalk.gray('(No data)'));
            return;
        }

        const widths = headers.map((h, i) => {
            const maxRow = Math.max(...rows.map(r => cellText(r[i]).length));
            return Math.max(h.length, maxRow) + 2;
        });

        console.log(headers.map((h, i) => chalk.bold(h.padEnd(widths[i]))).join(''));
        console.log(widths.map(w => '-'.repeat(w - 1)).join(' '));
        for (const row of rows) {
            console.log(row.map((cell, i) => cellText(cell).padEnd(widths[i])).join(''));
        }
    }

    /** `key: value` lines with aligned values. */
    static printKeyValues(entries: Record<string, TableCell>): void {
        const keys = Object.keys(entries);
        const width = Math.max(0, ...keys.map(k => k.length)) + 1;
        for (const key of keys) {
            console.log(`  ${chalk.bold((key + ':').padEnd(width + 1))}${cellText(entries[key])}`);
        }
    }

    static success(message: string): void {
        console.log(chalk.green('✔ ' + message));
    }

    static error(message: string): void {
        console.error(chalk.red('✖ ' + message));
    }

    static info(message: string): void {
        console.log(chalk.blue('ℹ ' + message));
    }

    static warn(message: string): void {
        console.log(chalk.yellow('⚠ ' + message));
    }
}
