/**
 * Formatter utility
 * Table and duration output for CLI and status reports
 */

import chalk from 'chalk';

/**
 * Print data as an aligned table
 */
export function printTable(headers: string[], rows: string[][]): void {
    const colWidths = headers.map((h, i) => {
        const maxData = rows.reduce((max, row) => Math.max(max, (row[i] || '').length), 0);
        return Math.max(h.length, maxData) + 2;
    });

    console.log(headers.map((h, i) => chalk.bold(h.padEnd(colWidths[i]))).join(''));
    console.log(chalk.dim('─'.repeat(colWidths.reduce((a, b) => a + b, 0))));

    for (const row of rows) {
        console.log(row.map((cell, i) => (cell || '').padEnd(colWidths[i])).join(''));
    }
}

/**
 * Format a date as a short readable string
 */
export function formatDate(date: Date | string | number): string {
    const d = new Date(date);
    return d.toLocaleString('en-US', {
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

/**
 * Format a remaining duration, coarsest non-zero unit first:
 * `2h 5m`, `4m 10s`, `42s`. Zero or negative reads as `expired`.
 */
export function formatRemaining(totalSeconds: number): string {
    const seconds = Math.floor(totalSeconds);
    if (seconds <= 0) return 'expired';

    const hours = Math.floor(seconds / 3600);
    const minutes = Math.floor((seconds % 3600) / 60);
    const secs = seconds % 60;

    if (hours > 0) return `${hours}h ${minutes}m`;
    if (minutes > 0) return `${minutes}m ${secs}s`;
    return `${secs}s`;
}
