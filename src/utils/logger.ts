/**
 * Logger - Scoped console logger for the figure plugin.
 *
 * Debug/info output stays muted until debug mode is switched on; warnings and
 * errors always reach the console. Every line is prefixed with `[scope]`.
 */
export class Logger {
    private debugMode = false;

    constructor(private readonly scope: string) {}

    public setDebugMode(enabled: boolean): void {
        this.debugMode = enabled;
    }

    private prefix(args: unknown[]): unknown[] {
        return [`[${this.scope}]`, ...args];
    }

    public debug(...args: unknown[]): void {
        if (this.debugMode) {
            console.log(...this.prefix(args));
        }
    }

    public info(...args: unknown[]): void {
        if (this.debugMode) {
            console.info(...this.prefix(args));
        }
    }

    public warn(...args: unknown[]): void {
        console.warn(...this.prefix(args));
    }

    public error(...args: unknown[]): void {
        console.error(...this.prefix(args));
    }
}

export const logger = new Logger('figure');
