export type Transcript = string;
export type Summary = string;

export interface Report {
  reportPath: string;
  transcript: Transcript;
  summary: Summary;
}

export interface PublishedReport {
  locator: string;
  downloadUrl: string | null;
}

export interface RequestResult {
  success: boolean;
  message: string;
  report_file_locator: string | null;
  report_download_url: string | null;
}
