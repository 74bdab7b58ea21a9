export type PinPosterErrorCode =
  | 'CONFIG_INVALID'
  | 'METADATA_INPUT_INVALID'
  | 'IMAGES_FOLDER_INVALID'
  | 'AUTH_TIMEOUT'
  | 'BROWSER_LAUNCH_FAILED'
  | 'SESSION_LOST';

export class PinPosterError extends Error {
  readonly code: PinPosterErrorCode;

  constructor(code: PinPosterErrorCode, message: string) {
    super(`[${code}] ${message}`);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends PinPosterError {
  readonly configPath: string;

  constructor(configPath: string, detail: string) {
    super('CONFIG_INVALID', `config=${configPath} ${detail}`);
    this.configPath = configPath;
  }
}

export class MetadataInputError extends PinPosterError {
  readonly csvPath: string;

  constructor(csvPath: string, detail: string) {
    super('METADATA_INPUT_INVALID', `csv=${csvPath} ${detail}`);
    this.csvPath = csvPath;
  }
}

export class ImagesFolderError extends PinPosterError {
  readonly folder: string;
  readonly reason: 'missing' | 'empty';

  constructor(folder: string, reason: 'missing' | 'empty') {
    super(
      'IMAGES_FOLDER_INVALID',
      reason === 'missing' ? `images folder not found: ${folder}` : `no supported images in ${folder}`,
    );
    this.folder = folder;
    this.reason = reason;
  }
}

export class AuthenticationTimeoutError extends PinPosterError {
  readonly timeoutSeconds: number;
  readonly lastSignal: string;

  constructor(timeoutSeconds: number, lastSignal: string) {
    super('AUTH_TIMEOUT', `login not detected within ${timeoutSeconds}s (last_signal=${lastSignal})`);
    this.timeoutSeconds = timeoutSeconds;
    this.lastSignal = lastSignal;
  }
}

export class BrowserLaunchError extends PinPosterError {
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super('BROWSER_LAUNCH_FAILED', `attempts=${attempts} lastError=${String(lastError)}`);
    this.attempts = attempts;
  }
}

export class SessionLostError extends PinPosterError {
  constructor(detail: string) {
    super('SESSION_LOST', detail);
  }
}

const SESSION_LOST_PATTERNS = [
  /Target (page, context or browser|closed)/i,
  /browser has been closed/i,
  /browser has disconnected/i,
  /context (has been|was) closed/i,
  /page has been closed/i,
  /Protocol error.*Target closed/i,
];

/** Playwright가 던지는 "브라우저/페이지 닫힘" 계열 오류인지 판별 */
export function isSessionLostError(error: unknown): boolean {
  if (error instanceof SessionLostError) return true;
  const message = error instanceof Error ? error.message : String(error ?? '');
  return SESSION_LOST_PATTERNS.some((pattern) => pattern.test(message));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type RunFailureCategory = 'startup' | 'auth' | 'browser' | 'session_lost' | 'unknown';

export function classifyRunFailure(error: unknown): { category: RunFailureCategory; exitCode: number } {
  if (error instanceof ConfigError || error instanceof MetadataInputError || error instanceof ImagesFolderError) {
    return { category: 'startup', exitCode: 1 };
  }
  if (error instanceof AuthenticationTimeoutError) {
    return { category: 'auth', exitCode: 1 };
  }
  if (error instanceof BrowserLaunchError) {
    return { category: 'browser', exitCode: 1 };
  }
  if (isSessionLostError(error)) {
    return { category: 'session_lost', exitCode: 1 };
  }
  return { category: 'unknown', exitCode: 1 };
}
