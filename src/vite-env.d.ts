/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_FETCH_TIMEOUT_MS?: string
  readonly VITE_DEFAULT_METRIC_COUNT?: string
  readonly VITE_DASHBOARD_TITLE?: string
}

interface ImportMeta {
  readonly env: ImportMetaEnv
}
