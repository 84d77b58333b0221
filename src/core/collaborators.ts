import { FilesystemArtifactWriter, type ArtifactWriter } from '../artifacts/writer.js';
import { Logger, openFileSink, parseLogLevel, streamSink, type OutputStream } from '../utils/logger.js';

export interface CollaboratorSettings {
  logFile: string;
  logLevel: string;
  artifactsDir: string;
}

export interface CollaboratorOptions {
  /** Console stream log lines are echoed to. Default: process.stderr */
  stderr?: OutputStream;
  now?: () => Date;
}

/** The logger and artifact writer one invocation owns. `close` must run on every exit path. */
export interface Collaborators {
  logger: Logger;
  artifacts: ArtifactWriter;
  close(): void;
}

/**
 * Builds the logger (console + log file) and the artifact writer for one
 * invocation. If the artifact directory cannot be created, the failure is
 * logged and the log file closed before the error propagates.
 */
export function createCollaborators(
  settings: CollaboratorSettings,
  options: CollaboratorOptions = {},
): Collaborators {
  const logger = new Logger({
    sinks: [streamSink(options.stderr ?? process.stderr)],
    now: options.now,
  });

  const fileSink = openFileSink(settings.logFile);
  if (fileSink) {
    logger.addSink(fileSink);
  } else {
    logger.info('Failed to log to file, using default stderr', { logfile: settings.logFile });
  }

  const level = parseLogLevel(settings.logLevel);
  if (level) logger.setLevel(level);

  let artifacts: ArtifactWriter;
  try {
    artifacts = new FilesystemArtifactWriter(settings.artifactsDir);
  } catch (err) {
    logger.error('unable to create artifacts directory', { dir: settings.artifactsDir, error: err });
    logger.close();
    throw err;
  }

  return {
    logger,
    artifacts,
    close: () => logger.close(),
  };
}
