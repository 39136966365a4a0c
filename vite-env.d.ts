/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_API_ROOT?: string;
  readonly VITE_STREAM_TIMEOUT?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
