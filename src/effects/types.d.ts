// ============================================================================
// Configuration
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type CliConfig = {
    readonly storeName: string;
    readonly logLevel: LogLevel;
}
