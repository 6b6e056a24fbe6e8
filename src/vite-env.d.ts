/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_LOG_LEVEL?: string;
  readonly VITE_STRICT_GEOMETRY?: string;
  readonly VITE_RING_SEED?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
