import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { LoggerLike } from '../common/logger';
import { errorMessage } from '../common/errors';
import { ScanProgressEvent } from '../types';

// Posts scan progress to a caller-provided callback URL
export class ProgressReporter {
  private logger: LoggerLike;
  private callbackUrl: string;
  private client: AxiosInstance;

  constructor(callbackUrl: string, logger: LoggerLike, adapter?: AxiosAdapter) {
    this.callbackUrl = callbackUrl;
    this.logger = logger;

    this.client = axios.create({
      timeout: 10000,
      adapter,
      headers: {
        'Content-Type': 'application/json'
      }
    });
  }

  async report(event: ScanProgressEvent): Promise<boolean> {
    try {
      await this.client.post(this.callbackUrl, {
        scan_id: event.ScanId,
        check_id: event.CheckId,
        status: event.Status,
        completed: event.Completed,
        total: event.Total,
        timestamp: new Date().toISOString()
      });
      return true;
    } catch (error) {
      this.logger.error('Failed to post scan progress', { error: errorMessage(error) }, { scan_id: event.ScanId });
      return false;
    }
  }
}
