export type ReportState = "REQUESTED" | "QUEUED" | "PROCESSING" | "DONE" | "FATAL" | "CANCELLED";

export type TerminalReportState = Extract<ReportState, "DONE" | "FATAL" | "CANCELLED">;

/** Allowed moves. Repeated polls in the same state are self-transitions. */
export const reportTransitions: Readonly<Record<ReportState, readonly ReportState[]>> = Object.freeze({
  REQUESTED: ["QUEUED", "PROCESSING", "DONE", "FATAL", "CANCELLED"],
  QUEUED: ["QUEUED", "PROCESSING", "DONE", "FATAL", "CANCELLED"],
  PROCESSING: ["PROCESSING", "DONE", "FATAL", "CANCELLED"],
  DONE: [],
  FATAL: [],
  CANCELLED: []
});

const upstreamStatusMap: Readonly<Record<string, ReportState>> = Object.freeze({
  IN_QUEUE: "QUEUED",
  IN_PROGRESS: "PROCESSING",
  DONE: "DONE",
  FATAL: "FATAL",
  CANCELLED: "CANCELLED"
});

export const mapUpstreamStatus = (status: string): ReportState | undefined =>
  upstreamStatusMap[status.trim().toUpperCase()];

export const isTerminalState = (state: ReportState): state is TerminalReportState =>
  reportTransitions[state].length === 0;

export const canTransition = (from: ReportState, to: ReportState): boolean => reportTransitions[from].includes(to);
