export type ReportRequest = {
  reportType: string;
  marketplaceIds: string[];
  dataStartTime: string;
  dataEndTime: string;
  reportOptions?: Record<string, string>;
};

export type ReportStatusSnapshot = {
  status: string;       // upstream processing status, e.g. IN_QUEUE / IN_PROGRESS / DONE
  resultRef?: string;   // document id once DONE
};

export type ResultLocation = {
  url: string;          // pre-signed, short-lived
  compression?: "GZIP";
  expiresAt?: Date;
};

export interface ReportApiClient {
  createReport(request: ReportRequest): Promise<string>;
  getReportStatus(reportId: string): Promise<ReportStatusSnapshot>;
  getResultLocation(resultRef: string): Promise<ResultLocation>;
  downloadResult(location: ResultLocation): Promise<Uint8Array>;
}

/** The pre-signed URL was rejected as expired; a fresh location has to be resolved. */
export class ResultLocationExpiredError extends Error {
  constructor(message = "Result location expired") {
    super(message);
    this.name = "ResultLocationExpiredError";
  }
}
