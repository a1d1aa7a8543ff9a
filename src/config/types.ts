import { LogLevel } from "../observability/types";

export interface AppConfig {
  /** Tag query, for example `"cat rating:general"`. */
  tags: string;
  /** How many posts to download. */
  count: number;
  downloadDir: string;
  /** Request timeout for every HTTP call; 0 disables it. */
  timeoutSeconds: number;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  /** Overrides the host parallelism as the download permit count. */
  concurrency?: number;
  apiKey?: string;
  userId?: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
