export interface BreachResult {
  offlineHit: boolean;
  onlineHit: boolean;
  onlineCount?: number;
  /** False when the online lookup was skipped or failed. */
  onlineChecked: boolean;
}

export interface OnlineBreachStatus {
  checked: boolean;
  hit: boolean;
  count?: number;
}

export interface OnlineLookupOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HashParts {
  prefix: string;
  suffix: string;
}
