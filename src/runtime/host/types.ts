export interface ComponentStatus {
  name: string;
  status: "healthy" | "degraded" | "unhealthy";
  lastCheck: Date;
  details?: Record<string, unknown>;
}

export interface RuntimeStatus {
  running: boolean;
  pid: number | null;
  uptime: number; // in seconds
  startedAt: Date | null;
  health: {
    overall: "healthy" | "degraded" | "unhealthy";
    components: ComponentStatus[];
  };
  connections: {
    total: number;
    running: number;
    error: number;
  };
  inbound: {
    pending: number;
  };
}
