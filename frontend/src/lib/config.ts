const DEFAULT_REDIRECT_URL = 'https://app.causify.ai/sentinel';

function readPositiveNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    console.warn(`[config] ${name}="${value}" is not a positive number, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

export interface AppConfig {
  redirectUrl: string;
  loadingDelayMs: number;
  infoRotationMs: number;
  previewRotationMs: number;
}

export interface ConfigEnv {
  PUBLIC_REDIRECT_URL?: string;
  PUBLIC_LOADING_DELAY_MS?: string;
  PUBLIC_INFO_ROTATION_MS?: string;
  PUBLIC_PREVIEW_ROTATION_MS?: string;
}

export function loadConfig(env: ConfigEnv): AppConfig {
  return {
    redirectUrl: env.PUBLIC_REDIRECT_URL || DEFAULT_REDIRECT_URL,
    loadingDelayMs: readPositiveNumber('PUBLIC_LOADING_DELAY_MS', env.PUBLIC_LOADING_DELAY_MS, 2500),
    infoRotationMs: readPositiveNumber('PUBLIC_INFO_ROTATION_MS', env.PUBLIC_INFO_ROTATION_MS, 5000),
    previewRotationMs: readPositiveNumber('PUBLIC_PREVIEW_ROTATION_MS', env.PUBLIC_PREVIEW_ROTATION_MS, 4000),
  };
}

export const config: AppConfig = loadConfig({
  PUBLIC_REDIRECT_URL: import.meta.env.PUBLIC_REDIRECT_URL,
  PUBLIC_LOADING_DELAY_MS: import.meta.env.PUBLIC_LOADING_DELAY_MS,
  PUBLIC_INFO_ROTATION_MS: import.meta.env.PUBLIC_INFO_ROTATION_MS,
  PUBLIC_PREVIEW_ROTATION_MS: import.meta.env.PUBLIC_PREVIEW_ROTATION_MS,
});
