import fs from 'fs-extra';

export async function extractPdfText(filePath: string): Promise<string> {
  const { PDFParse } = await import('pdf-parse');
  const buffer = await fs.readFile(filePath);

  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    const result = await parser.getText();
    return typeof result.text === 'string' ? result.text : '';
  } finally {
    await parser.destroy();
  }
}
