import { requestExtraction, writeExtractedImages } from '../extraction-service-client';
import { extractPdfText } from '../pdf-text';
import type { FileCategory } from '../types';

export type ExtractionOutput = {
  texts: string[];
  tables: string[];
};

/**
 * One extraction routine for one file category. Implementations may write page or slide images
 * into `imageOutputDir`; the dispatcher discovers them there after `extract` returns.
 */
export interface ExtractionCapability {
  id: string;
  extract(filePath: string, imageOutputDir: string): Promise<ExtractionOutput>;
}

export type ExtractionCapabilitySet = Record<FileCategory, ExtractionCapability>;

class RemoteExtractionCapability implements ExtractionCapability {
  readonly id: string;

  constructor(private readonly category: FileCategory) {
    this.id = `remote-v1:${category}`;
  }

  async extract(filePath: string, imageOutputDir: string): Promise<ExtractionOutput> {
    const payload = await requestExtraction(this.category, filePath);
    const written = await writeExtractedImages(payload.images, imageOutputDir);
    if (written.length > 0) {
      console.log(`[extraction] provider=${this.id} wrote ${written.length} image(s) to ${imageOutputDir}`);
    }

    return { texts: payload.texts, tables: payload.tables };
  }
}

class LocalPdfCapability implements ExtractionCapability {
  id = 'local-v1:pdf';

  async extract(filePath: string, _imageOutputDir: string): Promise<ExtractionOutput> {
    const text = (await extractPdfText(filePath)).trim();
    return { texts: text ? [text] : [], tables: [] };
  }
}

class UnavailableCapability implements ExtractionCapability {
  readonly id: string;

  constructor(private readonly category: FileCategory) {
    this.id = `local-v1:${category}`;
  }

  async extract(_filePath: string, _imageOutputDir: string): Promise<ExtractionOutput> {
    throw new Error(
      `No local extractor for category "${this.category}"; set EXTRACTION_PROVIDER=remote-v1`
    );
  }
}

export function createExtractionCapabilities(providerId: string): ExtractionCapabilitySet {
  if (providerId === 'remote-v1') {
    return {
      image: new RemoteExtractionCapability('image'),
      pdf: new RemoteExtractionCapability('pdf'),
      'slide-deck': new RemoteExtractionCapability('slide-deck'),
    };
  }

  if (providerId === 'local-v1') {
    return {
      image: new UnavailableCapability('image'),
      pdf: new LocalPdfCapability(),
      'slide-deck': new UnavailableCapability('slide-deck'),
    };
  }

  throw new Error(`Unknown extraction provider "${providerId}"`);
}
