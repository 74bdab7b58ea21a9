import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from './errors';

export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_IMAGES_FOLDER = 'bulk_post_pinterest';

export interface RunConfig {
  boardName: string;
  loginWaitSeconds: number;
  delayBetweenPinsSeconds: number;
  imagesFolder: string;
  headless: boolean;
  /** 요소 대기(업로드 대상, 필드, 보드 목록) 한도 */
  elementTimeoutSeconds: number;
  /** 발행 확인 신호 대기 한도 */
  publishTimeoutSeconds: number;
  pollIntervalMs: number;
  maxAttemptsPerPin: number;
}

export const DEFAULT_RUN_CONFIG: Readonly<RunConfig> = Object.freeze({
  boardName: '',
  loginWaitSeconds: 60,
  delayBetweenPinsSeconds: 2,
  imagesFolder: DEFAULT_IMAGES_FOLDER,
  headless: false,
  elementTimeoutSeconds: 30,
  publishTimeoutSeconds: 60,
  pollIntervalMs: 500,
  maxAttemptsPerPin: 1,
});

type FieldSpec =
  | { kind: 'string'; set: (config: RunConfig, value: string) => void }
  | { kind: 'boolean'; set: (config: RunConfig, value: boolean) => void }
  | { kind: 'number'; min: number; integer?: boolean; set: (config: RunConfig, value: number) => void };

/** JSON 키 → RunConfig 필드. 목록에 없는 키는 무시한다 */
const CONFIG_FIELDS: Record<string, FieldSpec> = {
  board_name: { kind: 'string', set: (c, v) => { c.boardName = v; } },
  login_wait_seconds: { kind: 'number', min: 0, set: (c, v) => { c.loginWaitSeconds = v; } },
  delay_between_pins: { kind: 'number', min: 0, set: (c, v) => { c.delayBetweenPinsSeconds = v; } },
  images_folder: { kind: 'string', set: (c, v) => { c.imagesFolder = v; } },
  headless: { kind: 'boolean', set: (c, v) => { c.headless = v; } },
  element_timeout_seconds: { kind: 'number', min: 1, set: (c, v) => { c.elementTimeoutSeconds = v; } },
  publish_timeout_seconds: { kind: 'number', min: 1, set: (c, v) => { c.publishTimeoutSeconds = v; } },
  poll_interval_ms: { kind: 'number', min: 10, integer: true, set: (c, v) => { c.pollIntervalMs = v; } },
  max_attempts_per_pin: { kind: 'number', min: 1, integer: true, set: (c, v) => { c.maxAttemptsPerPin = v; } },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseRunConfig(raw: unknown, configPath: string): RunConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError(configPath, 'root must be a JSON object');
  }
  const config: RunConfig = { ...DEFAULT_RUN_CONFIG };
  for (const [jsonKey, spec] of Object.entries(CONFIG_FIELDS)) {
    const value = raw[jsonKey];
    if (value === undefined || value === null) continue;
    switch (spec.kind) {
      case 'string':
        if (typeof value !== 'string') {
          throw new ConfigError(configPath, `field ${jsonKey} must be a string`);
        }
        spec.set(config, value.trim());
        break;
      case 'boolean':
        if (typeof value !== 'boolean') {
          throw new ConfigError(configPath, `field ${jsonKey} must be a boolean`);
        }
        spec.set(config, value);
        break;
      case 'number':
        if (typeof value !== 'number' || !Number.isFinite(value)) {
          throw new ConfigError(configPath, `field ${jsonKey} must be a number`);
        }
        if (value < spec.min) {
          throw new ConfigError(configPath, `field ${jsonKey} must be >= ${spec.min}`);
        }
        if (spec.integer && !Number.isInteger(value)) {
          throw new ConfigError(configPath, `field ${jsonKey} must be an integer`);
        }
        spec.set(config, value);
        break;
    }
  }
  return config;
}

/**
 * 설정 파일을 읽는다.
 * 기본 경로의 파일이 없으면 기본값을 쓰고, 명시한 경로가 없으면 시작 단계 오류로 본다.
 * 상대 경로 images_folder는 설정 파일 디렉토리 기준으로 해석한다.
 */
export function loadRunConfig(
  configPath: string,
  opts: { explicit: boolean } = { explicit: false },
): { config: RunConfig; source: 'file' | 'defaults' } {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    if (opts.explicit) {
      throw new ConfigError(resolvedPath, 'file not found');
    }
    return {
      config: { ...DEFAULT_RUN_CONFIG, imagesFolder: path.resolve(DEFAULT_RUN_CONFIG.imagesFolder) },
      source: 'defaults',
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(resolvedPath, `invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = parseRunConfig(raw, resolvedPath);
  config.imagesFolder = path.resolve(path.dirname(resolvedPath), config.imagesFolder || DEFAULT_IMAGES_FOLDER);
  return { config, source: 'file' };
}

export type CliOverrides = {
  board?: string;
  images?: string;
  headless?: boolean;
};

/** CLI 인자가 설정 파일 값을 덮어쓴다. --headless는 켜는 방향으로만 적용 */
export function applyCliOverrides(config: RunConfig, overrides: CliOverrides): Readonly<RunConfig> {
  const board = overrides.board?.trim();
  const images = overrides.images?.trim();
  return Object.freeze({
    ...config,
    boardName: board ? board : config.boardName,
    imagesFolder: images ? path.resolve(images) : config.imagesFolder,
    headless: Boolean(overrides.headless) || config.headless,
  });
}

export type Endpoints = {
  loginUrl: string;
  pinBuilderUrl: string;
};

export function getEndpoints(): Endpoints {
  return {
    loginUrl: process.env.PINTEREST_LOGIN_URL ?? 'https://www.pinterest.com/login/',
    pinBuilderUrl: process.env.PINTEREST_PIN_BUILDER_URL ?? 'https://www.pinterest.com/pin-builder/',
  };
}

export type RuntimeSettings = {
  browserLaunchRetries: number;
  browserLaunchTimeoutMs: number;
  browserLaunchRetryDelayMs: number;
};

export function getRuntimeSettings(): RuntimeSettings {
  return {
    browserLaunchRetries: Math.max(
      0,
      parseInt(process.env.PINPOST_BROWSER_LAUNCH_RETRIES ?? '1', 10) || 0,
    ),
    browserLaunchTimeoutMs: Math.max(
      5_000,
      parseInt(process.env.PINPOST_BROWSER_LAUNCH_TIMEOUT_MS ?? '30000', 10) || 0,
    ),
    browserLaunchRetryDelayMs: Math.max(
      100,
      parseInt(process.env.PINPOST_BROWSER_LAUNCH_RETRY_DELAY_MS ?? '800', 10) || 0,
    ),
  };
}
