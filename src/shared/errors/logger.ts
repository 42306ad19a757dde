/**
 * Error Logger
 *
 * Keeps a bounded in-memory history of errors and forwards each entry to
 * the pino error sink.
 */

import { loggers } from '../logging';
import { ErrorInfo, AppError, ErrorCategory, ErrorSeverity } from './types';

export class ErrorLogger {
  private static logs: ErrorInfo[] = [];
  private static maxLogs = 1000;

  /**
   * Log an error with technical details
   */
  static logError(error: AppError | Error): void {
    const errorInfo: ErrorInfo = error instanceof AppError
      ? {
          category: error.category,
          severity: error.severity,
          userMessage: error.userMessage,
          technicalDetails: error.technicalDetails,
          timestamp: error.timestamp,
          context: error.context,
          recoverable: error.recoverable,
          suggestedAction: error.suggestedAction
        }
      : {
          category: ErrorCategory.UNEXPECTED,
          severity: ErrorSeverity.CRITICAL,
          userMessage: 'An unexpected error occurred',
          technicalDetails: error.message,
          timestamp: new Date(),
          recoverable: false
        };

    this.logs.push(errorInfo);

    if (this.logs.length > this.maxLogs) {
      this.logs = this.logs.slice(-this.maxLogs);
    }

    const fields = {
      category: errorInfo.category,
      severity: errorInfo.severity,
      details: errorInfo.technicalDetails,
      context: errorInfo.context
    };
    if (errorInfo.severity === ErrorSeverity.LOW || errorInfo.severity === ErrorSeverity.MEDIUM) {
      loggers.errors.warn(fields, errorInfo.userMessage);
    } else {
      loggers.errors.error(fields, errorInfo.userMessage);
    }
  }

  static getLogs(): ErrorInfo[] {
    return [...this.logs];
  }

  static clearLogs(): void {
    this.logs = [];
  }
}
