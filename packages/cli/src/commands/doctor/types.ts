/**
 * Type definitions for `recordc doctor`
 */

export type CheckStatus = 'pass' | 'warn' | 'fail' | 'skip';

export interface DoctorCheckResult {
  name: string;           // e.g., 'config', 'compiler', 'workspace'
  status: CheckStatus;
  message: string;
  recommendation?: string;
  details?: Record<string, unknown>;
}

export interface DoctorOptions {
  project: string;
  json?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

/**
 * Overall doctor report (for JSON output)
 */
export interface DoctorReport {
  status: 'healthy' | 'warning' | 'error';
  timestamp: string;
  project: string;
  checks: DoctorCheckResult[];
  recommendations: string[];
  versions: {
    cli: string;
    core: string;
    protocol: number;
  };
}
