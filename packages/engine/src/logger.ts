import fs from 'fs';

let logFile = './rowquery.log';
let logStream: fs.WriteStream | null = null;
let logLastPromise: Promise<void> = Promise.resolve();
let lastLogTime = 0;
let logEnabled = false;

function prepareLog(): fs.WriteStream {
  if (!logStream) {
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
    logStream.setMaxListeners(100);
  }
  return logStream;
}

function write(stream: fs.WriteStream, text: string): Promise<void> {
  return new Promise<void>((resolve) => {
    if (!stream.write(text)) {
      stream.once('drain', resolve);
    } else {
      resolve();
    }
  });
}

function logQueue(text: string): void {
  const stream = prepareLog();
  logLastPromise = logLastPromise.then(() => write(stream, text));
}

function formatDateTime(): string {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const ms = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${ms}`;
}

function formatElapsed(elapsed: number): string {
  if (elapsed >= 100000) {
    return `+${(elapsed / 60000).toFixed(1).padStart(5, ' ')}m `;
  }
  if (elapsed >= 1000) {
    return `+${(elapsed / 1000).toFixed(1).padStart(5, ' ')}s `;
  }
  return `+${elapsed.toFixed(1).padStart(5, ' ')}ms`;
}

export interface LoggerOptions {
  enabled?: boolean;
  file?: string;
}

/**
 * Global logger instance. Writes timestamped lines to a log file; disabled
 * until configured.
 */
export const logger = {
  /**
   * Log a message to the log file
   */
  log(msg: unknown): void {
    if (!logEnabled) {
      return;
    }

    const now = performance.now();
    const elapsed = now - (lastLogTime || now);
    lastLogTime = now;

    const text = typeof msg === 'string' ? msg : JSON.stringify(msg);
    logQueue(`[${formatDateTime()}] (${formatElapsed(elapsed)}) ${text}\n`);
  },

  /**
   * Enable or disable logging and choose the log file. Changing the file
   * closes the current stream once pending writes finish.
   */
  configure(options: LoggerOptions): void {
    if (options.enabled !== undefined) {
      logEnabled = options.enabled;
    }
    if (options.file !== undefined && options.file !== logFile) {
      const previous = logStream;
      logStream = null;
      logFile = options.file;
      if (previous) {
        logLastPromise = logLastPromise.then(() => new Promise<void>(resolve => previous.end(resolve)));
      }
    }
  },

  isEnabled(): boolean {
    return logEnabled;
  },

  /**
   * Resolves once every queued line has been written
   */
  flush(): Promise<void> {
    return logLastPromise;
  },

  /**
   * Flush and close the log file
   */
  async close(): Promise<void> {
    await logLastPromise;
    const stream = logStream;
    logStream = null;
    if (stream) {
      await new Promise<void>(resolve => stream.end(resolve));
    }
  },

  /**
   * Route console output into the log. Returns a function that restores the
   * original console methods.
   */
  captureConsole(): () => void {
    const original = {
      log: console.log,
      error: console.error,
      debug: console.debug,
      warn: console.warn,
      info: console.info,
    };

    console.log = (...args: unknown[]) => logger.log(args);
    console.error = (...args: unknown[]) => logger.log(args);
    console.debug = (...args: unknown[]) => logger.log(args);
    console.warn = (...args: unknown[]) => logger.log(args);
    console.info = (...args: unknown[]) => logger.log(args);

    return () => {
      Object.assign(console, original);
    };
  },
};
