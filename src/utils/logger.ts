export type LogLevel = "debug" | "info" | "warn" | "error";

export interface TimingResult {
    label: string;
    durationMs: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Process-wide logger. Everything goes to stderr: stdout belongs to the
 * MCP stdio transport when the server is running.
 */
class Logger {
    private static instance: Logger;
    private level: LogLevel = "info";
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;

    private constructor() {
        // Use getInstance()
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLevel(): LogLevel {
        return this.level;
    }

    public isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    private write(level: LogLevel, message: string): void {
        if (!this.isEnabled(level)) return;
        process.stderr.write(`[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}\n`);
    }

    public debug(message: string): void {
        this.write("debug", message);
    }

    public info(message: string): void {
        this.write("info", message);
    }

    public warn(message: string): void {
        this.write("warn", message);
    }

    public error(message: string): void {
        this.write("error", message);
    }

    /**
     * Enable or disable timing collection
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Time an async function and record the result
     */
    public async timeAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        try {
            return await fn();
        } finally {
            this.timings.push({ label, durationMs: performance.now() - start });
        }
    }

    public recordTiming(label: string, durationMs: number): void {
        if (this.timingEnabled) {
            this.timings.push({ label, durationMs });
        }
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    public clearTimings(): void {
        this.timings = [];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (!this.timingEnabled) return;
        if (this.timings.length === 0) {
            process.stderr.write("[TIMING] No timings recorded\n");
            return;
        }

        const lines = ["", "[TIMING] === Performance Summary ==="];
        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);

        for (const timing of this.timings) {
            const pct = total > 0 ? ((timing.durationMs / total) * 100).toFixed(1) : "0.0";
            lines.push(`[TIMING] ${timing.label.padEnd(40)} ${timing.durationMs.toFixed(2).padStart(9)}ms (${pct.padStart(5)}%)`);
        }

        lines.push(`[TIMING] ${"TOTAL".padEnd(40)} ${total.toFixed(2).padStart(9)}ms`);
        lines.push("[TIMING] ================================", "");
        process.stderr.write(lines.join("\n"));
    }
}

export default Logger;
