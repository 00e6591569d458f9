import chalk from "chalk";
import { ServiceStatus } from "./runtime/types.js";

export interface TableRow {
    service: string;
    status: ServiceStatus;
    identifier: string;
    image: string;
}

/**
 * One-way notifications from the engine to whatever presents them.
 */
export interface Reporter {
    info(message: string): void;
    warning(message: string): void;
    success(message: string): void;
    error(message: string): void;
    command(argv: string[]): void;
    tableRow(row: TableRow): void;
}

const COLUMN_WIDTH = 15;
const HEADERS = [ "SERVICE", "STATUS", "CONTAINER ID", "IMAGE" ];

const STATUS_LABELS: Record<ServiceStatus, string> = {
    "not-created": "Not Created",
    "running": "Running",
    "stopped": "Stopped",
};

export function formatStatus(status: ServiceStatus): string {
    return STATUS_LABELS[status];
}

function pad(cell: string): string {
    return cell.padEnd(COLUMN_WIDTH);
}

export class ConsoleReporter implements Reporter {
    private verbose: boolean;
    private out: (line: string) => void;
    private headerPrinted = false;

    constructor(verbose = false, out: (line: string) => void = (line) => console.log(line)) {
        this.verbose = verbose;
        this.out = out;
    }

    header(text: string): void {
        this.out(chalk.blueBright.bold(text));
    }

    separator(): void {
        this.out(chalk.dim("=".repeat(60)));
    }

    info(message: string): void {
        this.out(`${chalk.blue.bold("[i]")} ${message}`);
    }

    warning(message: string): void {
        this.out(`${chalk.yellow.bold("[!]")} ${chalk.yellow(message)}`);
    }

    success(message: string): void {
        this.out(`${chalk.green.bold("[✓]")} ${chalk.green(message)}`);
    }

    error(message: string): void {
        this.out(`${chalk.red.bold("[✗]")} ${chalk.red.bold(message)}`);
    }

    command(argv: string[]): void {
        if (!this.verbose) {
            return;
        }
        this.out(`${chalk.cyan.bold("[>]")} ${chalk.dim(argv.join(" "))}`);
    }

    tableRow(row: TableRow): void {
        if (!this.headerPrinted) {
            const headerLine = HEADERS.map(pad).join(" ");
            this.out(chalk.bold(headerLine));
            this.out(chalk.dim("-".repeat(headerLine.length)));
            this.headerPrinted = true;
        }

        const label = pad(formatStatus(row.status));
        const coloredStatus = row.status === "running" ? chalk.green(label) : chalk.red(label);
        this.out([ pad(row.service), coloredStatus, pad(row.identifier), pad(row.image) ].join(" "));
    }
}
