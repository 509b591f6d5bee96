export const JOB_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = ['completed', 'failed'];

export const FILE_CATEGORIES = ['image', 'pdf', 'slide-deck'] as const;

export type FileCategory = (typeof FILE_CATEGORIES)[number];

export const OUTPUT_FORMATS = ['json', 'files'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type Job = {
  id: string;
  fileName: string;
  category: FileCategory;
  status: JobStatus;
  progress: number;
  message?: string;
  createdAt: string;
  updatedAt: string;
};

export type FragmentSource = 'image' | 'text' | 'ocr' | 'pdf' | 'page' | 'slide';

export type TextFragment = {
  text: string;
  source: FragmentSource;
  pageNumber: number | null;
};

export type TableFragment = {
  html: string;
  source: FragmentSource;
  pageNumber: number | null;
};

export type ImageReference = {
  path: string;
  source: FragmentSource;
  pageNumber: number | null;
};

export type JobResult = {
  jobId: string;
  fileName: string;
  category: FileCategory;
  texts: TextFragment[];
  tables: TableFragment[];
  images: ImageReference[];
  outputFiles: Record<string, string>;
  metadata: {
    outputFormat: OutputFormat;
    outputDirectory: string | null;
  };
};

export type DispatchOptions = {
  outputFormat: OutputFormat;
  /** Only used with `files` output; defaults to `<OUTPUT_ROOT>/<jobId>`. */
  outputDir?: string;
};

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && JOB_STATUSES.some((entry) => entry === value);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && OUTPUT_FORMATS.some((entry) => entry === value);
}
