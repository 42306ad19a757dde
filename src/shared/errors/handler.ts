/**
 * Error Handler
 *
 * Factories for the application's error categories plus helpers for
 * logging and presenting them.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';
import { ErrorLogger } from './logger';

type ErrorContext = Record<string, unknown>;

export class ErrorHandler {
  /**
   * Create a configuration error (missing credential, unusable setting)
   */
  static createConfigurationError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.CONFIGURATION,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Set ANTHROPIC_API_KEY or OPENAI_API_KEY in your environment and restart.'
    });
  }

  /**
   * Create a storage error
   */
  static createStorageError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.STORAGE,
      severity: ErrorSeverity.HIGH,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'Check that the database file is writable and try again.'
    });
  }

  /**
   * Create a validation error
   */
  static createValidationError(
    message: string,
    technicalDetails: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.VALIDATION,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails,
      timestamp: new Date(),
      context,
      recoverable: true,
      suggestedAction: 'Please correct the highlighted fields and try again.'
    });
  }

  /**
   * Create a not-found error for a missing record
   */
  static createNotFoundError(
    message: string,
    context?: ErrorContext
  ): AppError {
    return new AppError({
      category: ErrorCategory.NOT_FOUND,
      severity: ErrorSeverity.LOW,
      userMessage: message,
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: true
    });
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: ErrorContext
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: `Unexpected error: ${message}`,
      technicalDetails: error instanceof Error && error.stack ? error.stack : message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'If the problem persists, please check the server logs.'
    });
  }

  static logError(error: AppError | Error): void {
    ErrorLogger.logError(error);
  }

  static getLogs() {
    return ErrorLogger.getLogs();
  }

  static clearLogs(): void {
    ErrorLogger.clearLogs();
  }

  /**
   * Wrap a synchronous operation with error handling.
   * AppErrors pass through unchanged; anything else goes through the factory.
   */
  static handle<T>(
    operation: () => T,
    errorFactory: (error: unknown) => AppError
  ): T {
    try {
      return operation();
    } catch (error) {
      const appError = error instanceof AppError ? error : errorFactory(error);
      this.logError(appError);
      throw appError;
    }
  }
}
