/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly PUBLIC_REDIRECT_URL?: string;
  readonly PUBLIC_LOADING_DELAY_MS?: string;
  readonly PUBLIC_INFO_ROTATION_MS?: string;
  readonly PUBLIC_PREVIEW_ROTATION_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
