export interface ToleranceProfile {
  /** Absolute tolerance. */
  abs: number;
  /** Relative tolerance, scaled by the larger magnitude being compared. */
  rel: number;
}

export interface ToleranceConfig {
  schemaVersion: 1;
  defaultProfile: string;
  profiles: Record<string, ToleranceProfile>;
}

export const KNOWN_PROFILE_KEYS = ["abs", "rel", "epsilonMultiple", "precision"] as const;
