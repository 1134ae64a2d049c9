import chalk from 'chalk';

function formatValue(value: unknown): string {
    if (value === undefined || value === null || value === '') {
        return chalk.gray('(none)');
    }
    if (value instanceof Date) {
        return chalk.magenta(value.toISOString());
    }
    if (Array.isArray(value)) {
        return chalk.yellow(value.length ? value.join(', ') : '(empty array)');
    }
    if (typeof value === 'object') {
        return chalk.magentaBright(JSON.stringify(value, null, 2));
    }
    return chalk.cyanBright(String(value));
}

export function debugPrint(obj: Record<string, unknown>, title = 'Debug Info') {
    console.log();
    console.log(chalk.cyan.bold(`--- ${chalk.white.bold(title)} ---`));

    const width = Math.max(12, ...Object.keys(obj).map(key => key.length));
    for (const [key, value] of Object.entries(obj)) {
        console.log(chalk.green(`${key.padEnd(width)}:`), formatValue(value));
    }

    console.log(chalk.cyan.bold('---------------------------------------------'));
    console.log();
}
