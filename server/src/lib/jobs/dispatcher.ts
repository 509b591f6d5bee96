import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import fs from 'fs-extra';
import type { ExtractionCapability, ExtractionCapabilitySet } from './adapters/extraction-capabilities';
import { JobNotFoundError, UnsupportedFileTypeError, toErrorMessage } from './errors';
import {
  sortImageReferences,
  tagPdfPageImage,
  tagPdfText,
  tagSlideImage,
  tagTables,
} from './fragment-tagging';
import { applyJobUpdate, type JobUpdate } from './job-state';
import type { JobStore } from './job-store';
import {
  isTerminalStatus,
  type DispatchOptions,
  type FileCategory,
  type FragmentSource,
  type ImageReference,
  type Job,
  type JobResult,
  type TableFragment,
  type TextFragment,
} from './types';

type HandlerContext = {
  filePath: string;
  workDir: string;
  baseName: string;
  capability: ExtractionCapability;
  report: (progress: number, message: string) => Promise<void>;
};

type HandlerOutput = {
  texts: TextFragment[];
  tables: TableFragment[];
  images: ImageReference[];
  outputFiles: Record<string, string>;
};

type CategoryHandler = (context: HandlerContext) => Promise<HandlerOutput>;

type DocumentHandlerConfig = {
  extractingMessage: string;
  writingMessage: string;
  doneMessage: string;
  tagText: (text: string) => TextFragment;
  tableSource: FragmentSource;
  tagImage: (fileName: string, imagesDir: string) => ImageReference | null;
};

function asIsoTimestamp(value: number): string {
  return new Date(value).toISOString();
}

function joinBlocks(blocks: string[]): string {
  return blocks.map((block) => `${block}\n\n`).join('');
}

async function collectImages(
  imagesDir: string,
  tagImage: DocumentHandlerConfig['tagImage']
): Promise<ImageReference[]> {
  if (!(await fs.pathExists(imagesDir))) {
    return [];
  }

  const entries = await fs.readdir(imagesDir);
  const images: ImageReference[] = [];
  for (const entry of entries) {
    const reference = tagImage(entry, imagesDir);
    if (reference) {
      images.push(reference);
    }
  }
  return sortImageReferences(images);
}

const handleImage: CategoryHandler = async ({ filePath, workDir, baseName, capability, report }) => {
  await report(30, 'Applying OCR to image');
  const extraction = await capability.extract(filePath, workDir);
  const text = extraction.texts.join('\n');

  const textPath = join(workDir, `${baseName}.txt`);
  await fs.writeFile(textPath, text, 'utf8');
  await report(90, 'OCR completed, preparing results');

  // Image results carry one text fragment and nothing else.
  return {
    texts: [{ text, source: 'image', pageNumber: null }],
    tables: [],
    images: [],
    outputFiles: { text: textPath },
  };
};

function documentHandler(config: DocumentHandlerConfig): CategoryHandler {
  return async ({ filePath, workDir, baseName, capability, report }) => {
    await report(30, config.extractingMessage);
    const imagesDir = join(workDir, baseName);
    await fs.ensureDir(imagesDir);

    const extraction = await capability.extract(filePath, imagesDir);
    const textPath = join(workDir, `${baseName}.txt`);
    const tablesPath = join(workDir, `${baseName}_tables.html`);
    await report(70, config.writingMessage);

    await fs.writeFile(textPath, joinBlocks(extraction.texts.map((text) => text.trim())), 'utf8');
    await fs.writeFile(tablesPath, joinBlocks(extraction.tables), 'utf8');
    await report(90, config.doneMessage);

    return {
      texts: extraction.texts.map(config.tagText),
      tables: tagTables(extraction.tables, config.tableSource),
      images: await collectImages(imagesDir, config.tagImage),
      outputFiles: { text: textPath, tables: tablesPath, imagesDir },
    };
  };
}

/** One handler per category; adding a category means adding an entry here. */
const CATEGORY_HANDLERS: Record<FileCategory, CategoryHandler> = {
  image: handleImage,
  pdf: documentHandler({
    extractingMessage: 'Extracting text and tables from PDF',
    writingMessage: 'Processing PDF pages',
    doneMessage: 'PDF processing completed, preparing results',
    tagText: tagPdfText,
    tableSource: 'pdf',
    tagImage: tagPdfPageImage,
  }),
  'slide-deck': documentHandler({
    extractingMessage: 'Extracting content from slide deck',
    writingMessage: 'Processing slides',
    doneMessage: 'Slide deck processing completed, preparing results',
    tagText: (text) => ({ text, source: 'slide', pageNumber: null }),
    tableSource: 'slide',
    tagImage: tagSlideImage,
  }),
};

export function outputBaseName(fileName: string): string {
  const stem = basename(fileName, extname(fileName));
  return stem.replace(/[^a-zA-Z0-9._-]/g, '_') || 'document';
}

export type JobDispatcherOptions = {
  store: JobStore;
  capabilities: Partial<ExtractionCapabilitySet>;
  /** Parent of per-job directories for `files` output. */
  outputRoot: string;
  /** Parent of scratch directories for inline (`json`) output. Defaults to the OS temp dir. */
  scratchRoot?: string;
  now?: () => Date;
};

/**
 * Runs one job from `pending` to a terminal state. `dispatch` never rejects: every failure is
 * recorded on the job as `failed`, because a background task dying silently would leave the job
 * stuck in `processing`.
 */
export class JobDispatcher {
  private readonly store: JobStore;
  private readonly capabilities: Partial<ExtractionCapabilitySet>;
  private readonly outputRoot: string;
  private readonly scratchRoot: string;
  private readonly now: () => Date;

  constructor(options: JobDispatcherOptions) {
    this.store = options.store;
    this.capabilities = options.capabilities;
    this.outputRoot = options.outputRoot;
    this.scratchRoot = options.scratchRoot ?? tmpdir();
    this.now = options.now ?? (() => new Date());
  }

  async dispatch(jobId: string, filePath: string, options: DispatchOptions): Promise<JobResult | null> {
    const startedMs = Date.now();
    let scratchDir: string | null = null;
    let resultWritten = false;

    try {
      const pending = await this.load(jobId);
      if (pending.status !== 'pending' || !(await this.store.claim(jobId))) {
        const reason = pending.status === 'pending' ? 'claimed by another dispatch' : `already ${pending.status}`;
        console.warn(`[dispatcher] jobId=${jobId} status=skipped reason="${reason}"`);
        return null;
      }

      const job = await this.save(
        applyJobUpdate(
          pending,
          { status: 'processing', progress: 10, message: `Starting ${pending.category} processing` },
          this.now()
        )
      );

      const capability = this.capabilities[job.category];
      const handler = CATEGORY_HANDLERS[job.category];
      if (!capability) {
        throw new UnsupportedFileTypeError(
          job.fileName,
          `No extraction capability registered for category "${job.category}"`
        );
      }
      await this.update(jobId, { status: 'processing', progress: 20, message: `Detected category: ${job.category}` });

      let workDir: string;
      if (options.outputFormat === 'files') {
        workDir = options.outputDir ?? join(this.outputRoot, jobId);
        await fs.ensureDir(workDir);
      } else {
        await fs.ensureDir(this.scratchRoot);
        scratchDir = await mkdtemp(join(this.scratchRoot, `extract_${jobId}_`));
        workDir = scratchDir;
      }

      const output = await handler({
        filePath,
        workDir,
        baseName: outputBaseName(job.fileName),
        capability: this.timed(jobId, capability),
        report: async (progress, message) => {
          await this.update(jobId, { status: 'processing', progress, message });
        },
      });

      const inline = options.outputFormat === 'json';
      const result: JobResult = {
        jobId,
        fileName: job.fileName,
        category: job.category,
        texts: output.texts,
        tables: output.tables,
        images: output.images,
        outputFiles: inline ? {} : output.outputFiles,
        metadata: {
          outputFormat: options.outputFormat,
          outputDirectory: inline ? null : workDir,
        },
      };

      await this.store.putResult(jobId, result);
      resultWritten = true;
      await this.update(jobId, { status: 'completed', progress: 100, message: 'Processing completed successfully' });

      const durationMs = Date.now() - startedMs;
      console.log(
        `[dispatcher] jobId=${jobId} category=${job.category} provider=${capability.id} status=completed texts=${result.texts.length} tables=${result.tables.length} images=${result.images.length} durationMs=${durationMs}`
      );
      return result;
    } catch (error) {
      await this.fail(jobId, error, resultWritten, Date.now() - startedMs);
      return null;
    } finally {
      if (scratchDir) {
        await this.removeScratch(jobId, scratchDir);
      }
    }
  }

  private async load(jobId: string): Promise<Job> {
    const job = await this.store.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  /** Writes only over an existing record, so a job deleted mid-run is never brought back. */
  private async save(job: Job): Promise<Job> {
    if (!(await this.store.replace(job))) {
      throw new JobNotFoundError(job.id);
    }
    return job;
  }

  private timed(jobId: string, capability: ExtractionCapability): ExtractionCapability {
    return {
      id: capability.id,
      extract: async (filePath, imageOutputDir) => {
        const extractionStartedMs = Date.now();
        try {
          const output = await capability.extract(filePath, imageOutputDir);
          const extractionEndedMs = Date.now();
          const durationMs = extractionEndedMs - extractionStartedMs;
          console.log(
            `[dispatcher][timing] phase=extraction jobId=${jobId} provider=${capability.id} status=ok texts=${output.texts.length} tables=${output.tables.length} startedAt=${asIsoTimestamp(extractionStartedMs)} endedAt=${asIsoTimestamp(extractionEndedMs)} durationMs=${durationMs} durationSec=${(durationMs / 1000).toFixed(3)}`
          );
          return output;
        } catch (error) {
          const extractionEndedMs = Date.now();
          const durationMs = extractionEndedMs - extractionStartedMs;
          console.error(
            `[dispatcher][timing] phase=extraction jobId=${jobId} provider=${capability.id} status=threw startedAt=${asIsoTimestamp(extractionStartedMs)} endedAt=${asIsoTimestamp(extractionEndedMs)} durationMs=${durationMs} durationSec=${(durationMs / 1000).toFixed(3)} error="${toErrorMessage(error)}"`
          );
          throw error;
        }
      },
    };
  }

  private async update(jobId: string, update: JobUpdate): Promise<Job> {
    const current = await this.load(jobId);
    return this.save(applyJobUpdate(current, update, this.now()));
  }

  private async fail(jobId: string, error: unknown, resultWritten: boolean, durationMs: number): Promise<void> {
    const reason = toErrorMessage(error, 'Unknown processing failure');

    try {
      const current = error instanceof JobNotFoundError ? null : await this.store.get(jobId);
      if (resultWritten && current?.status !== 'completed') {
        await this.store.deleteResult(jobId);
      }

      if (!current) {
        // Deleted or expired while running: nothing left to mark, and the record must not come back.
        console.warn(`[dispatcher] jobId=${jobId} status=abandoned durationMs=${durationMs} reason="${reason}"`);
        return;
      }

      console.error(`[dispatcher] jobId=${jobId} status=failed durationMs=${durationMs} error="${reason}"`);
      if (isTerminalStatus(current.status)) {
        return;
      }

      const recorded = await this.store.replace(
        applyJobUpdate(current, { status: 'failed', message: `Processing failed: ${reason}` }, this.now())
      );
      if (!recorded) {
        console.warn(`[dispatcher] jobId=${jobId} status=abandoned durationMs=${durationMs} reason="${reason}"`);
      }
    } catch (storeError) {
      console.error(
        `[dispatcher] jobId=${jobId} could not record failure "${reason}": ${toErrorMessage(storeError, 'Unknown store failure')}`
      );
    }
  }

  private async removeScratch(jobId: string, scratchDir: string): Promise<void> {
    try {
      await fs.remove(scratchDir);
    } catch (error) {
      console.warn(
        `[dispatcher] jobId=${jobId} failed to remove scratch dir ${scratchDir}: ${toErrorMessage(error)}`
      );
    }
  }
}
