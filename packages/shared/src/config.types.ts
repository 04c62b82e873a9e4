export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Config as stored in ~/.auditray/config.yaml. */
export interface AuditrayConfig {
  icon_theme: string;
  watcher: {
    path: string;
  };
  checker: {
    command: string;
    args: string[];
    advisory_base_url: string;
  };
  server: {
    port: number;
  };
  log: {
    level: LogLevel;
  };
}
