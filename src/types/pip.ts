// Shapes of pip's JSON output, as far as this tool reads them.

export interface PipArchiveInfo {
  hash?: string;
  hashes?: Record<string, string>;
}

export interface PipReportEntry {
  metadata: {
    name: string;
    version: string;
  };
  requested: boolean;
  is_direct?: boolean;
  download_info?: {
    url?: string;
    archive_info?: PipArchiveInfo;
  };
}

export interface PipReport {
  version?: string;
  pip_version?: string;
  install: PipReportEntry[];
}

export interface PipListEntry {
  name: string;
  version: string;
  editable_project_location?: string;
}
