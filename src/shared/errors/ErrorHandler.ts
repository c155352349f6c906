import {
  AppError,
  ErrorResponse,
  InternalError,
  NetworkError,
  ValidationError
} from './AppError';
import { ILogger, LoggerFactory } from '../logging/Logger';

/**
 * Error listener type
 */
export type ErrorListener = (error: AppError) => void;

/**
 * Turns any thrown value into an AppError and reports it
 */
export class ErrorHandler {
  private errorListeners: ErrorListener[] = [];

  constructor(private readonly logger: ILogger = LoggerFactory.getLogger('ErrorHandler')) {}

  /**
   * Normalize, log and broadcast an error
   */
  handle(error: unknown): ErrorResponse {
    const appError = this.normalize(error);

    this.logError(appError);
    this.notifyListeners(appError);

    return appError.toJSON();
  }

  addListener(listener: ErrorListener): void {
    this.errorListeners.push(listener);
  }

  removeListener(listener: ErrorListener): void {
    const index = this.errorListeners.indexOf(listener);
    if (index > -1) {
      this.errorListeners.splice(index, 1);
    }
  }

  /**
   * Normalize error to AppError
   */
  normalize(error: unknown): AppError {
    if (error instanceof AppError) {
      return error;
    }

    if (!(error instanceof Error)) {
      return new InternalError(String(error));
    }

    // YError is what yargs throws for bad command lines
    if (error.name === 'ValidationError' || error.name === 'YError') {
      return new ValidationError(error.message);
    }

    if (/ECONNREFUSED|ENOTFOUND|ECONNRESET|ETIMEDOUT/.test(error.message)) {
      return new NetworkError(error.message);
    }

    return new InternalError(error.message, { originalError: error.name });
  }

  private logError(error: AppError): void {
    if (error.isOperational) {
      this.logger.debug(`[${error.code}] ${error.message}`, error.details);
    } else {
      this.logger.error(`Non-operational error [${error.code}]`, error, error.details);
    }
  }

  private notifyListeners(error: AppError): void {
    this.errorListeners.forEach(listener => {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.error('Error in error listener', listenerError);
      }
    });
  }
}
