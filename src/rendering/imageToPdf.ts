/**
 * Image to PDF conversion. Every image lands on a single A4 portrait page,
 * scaled to fit inside the margins and centered.
 */

import { promises as fs } from 'fs';
import { PDFDocument, PDFImage, rgb } from 'pdf-lib';
import { RenderError } from '../errors';

export const A4_WIDTH_PT = 595;
export const A4_HEIGHT_PT = 842;
/** 10 mm */
export const PAGE_MARGIN_PT = 28.35;
const MIN_SCALE = 0.1;

export interface PagePlacement {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Size and position of an image on the page. Images that would shrink below
 * 10% inside the margins use the full page instead.
 */
export function computePageFit(
  imageWidth: number,
  imageHeight: number,
  pageWidth = A4_WIDTH_PT,
  pageHeight = A4_HEIGHT_PT,
  margin = PAGE_MARGIN_PT
): PagePlacement {
  if (imageWidth <= 0 || imageHeight <= 0) {
    throw new RangeError(`Invalid image size ${imageWidth}x${imageHeight}`);
  }

  const fitScale = (m: number) =>
    Math.min((pageWidth - 2 * m) / imageWidth, (pageHeight - 2 * m) / imageHeight);

  let scale = fitScale(margin);
  if (scale < MIN_SCALE) {
    scale = fitScale(0);
  }

  const width = Math.round(imageWidth * scale);
  const height = Math.round(imageHeight * scale);

  return {
    x: (pageWidth - width) / 2,
    y: (pageHeight - height) / 2,
    width,
    height,
  };
}

function isPng(data: Buffer): boolean {
  return data.length >= 8 && data.readUInt32BE(0) === 0x89504e47;
}

function isJpeg(data: Buffer): boolean {
  return data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff;
}

async function embedImage(doc: PDFDocument, data: Buffer): Promise<PDFImage> {
  if (isPng(data)) return doc.embedPng(data);
  if (isJpeg(data)) return doc.embedJpg(data);
  throw new Error('unrecognized image data (expected PNG or JPEG)');
}

/**
 * Render image bytes as a one-page PDF document.
 */
export async function renderImageBufferToPdf(data: Buffer, title?: string): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  if (title) doc.setTitle(title);

  const image = await embedImage(doc, data);
  const page = doc.addPage([A4_WIDTH_PT, A4_HEIGHT_PT]);
  page.drawRectangle({
    x: 0,
    y: 0,
    width: A4_WIDTH_PT,
    height: A4_HEIGHT_PT,
    color: rgb(1, 1, 1),
  });
  page.drawImage(image, computePageFit(image.width, image.height));

  return doc.save();
}

/**
 * Convert an image file into a PDF file beside it.
 */
export async function renderImageToPdf(imagePath: string, outputPath: string): Promise<string> {
  try {
    const data = await fs.readFile(imagePath);
    const pdfBytes = await renderImageBufferToPdf(data);
    await fs.writeFile(outputPath, pdfBytes);
    return outputPath;
  } catch (error: unknown) {
    throw RenderError.imageConversionFailed(imagePath, error instanceof Error ? error : undefined);
  }
}
