import logger from "../utils/logger";
import { errorMessage } from "../utils/errors";
import type { Notification, UploadResult } from "../models/upload.model";

export type Notifier = (notification: Notification) => void;

export const logNotifier: Notifier = ({ level, message }) => {
  if (level === "error") {
    logger.error(message);
  } else {
    logger.info(message);
  }
};

export class ResultService {
  private lastUrl: string | null = null;

  constructor(private readonly notify: Notifier = logNotifier) {}

  getLastUrl(): string | null {
    return this.lastUrl;
  }

  record(result: UploadResult): void {
    let notification: Notification;
    if (result.ok) {
      this.lastUrl = result.url;
      notification = {
        level: "info",
        message: `File "${result.remoteFileName}" uploaded: ${result.url}`,
      };
    } else {
      notification = {
        level: "error",
        message: `Upload of "${result.remoteFileName}" failed: ${result.error.message}`,
      };
    }

    try {
      this.notify(notification);
    } catch (error) {
      logger.error(`Notifier failed: ${errorMessage(error)}`, {
        jobId: result.jobId,
      });
    }
  }
}
