/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** Data file path, relative to the base URL. */
  readonly VITE_DATA_PATH?: string;
}
