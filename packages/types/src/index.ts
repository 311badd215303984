// Wire shapes returned by the ingest API. Persisted records carry every
// field; the narrower input shapes live next to their validators.

export interface Measurement {
  id: number;
  device_id: string;
  sensor: string;
  value: number;
  /** ISO-8601, always UTC (`Z`). */
  ts: string;
}

export interface Hero {
  id: number;
  name: string;
  secret_name: string;
  age: number | null;
}

export type IssueLocation = "body" | "query";

export interface ValidationIssue {
  location: IssueLocation;
  field: string;
  message: string;
}

export interface ErrorBody {
  error: string;
  details?: ValidationIssue[];
}

export interface HealthStatus {
  ok: boolean;
  services: {
    db: "ok" | "down";
  };
}
