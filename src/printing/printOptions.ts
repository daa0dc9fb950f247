/**
 * Print option encoding for the two spooler paths.
 */

import { IppGroup } from 'ipp';
import { SpoolOptions } from '../connectors/types';
import { ServiceSettings } from '../config/serviceConfig';

const ORIENTATION_CODES: Record<string, number> = {
  portrait: 3,
  landscape: 4,
  'reverse-portrait': 5,
  'reverse-landscape': 6,
};

const QUALITY_CODES: Record<string, number> = {
  draft: 3,
  normal: 4,
  high: 5,
};

const MEDIA_KEYWORDS: Record<string, string> = {
  a3: 'iso_a3_297x420mm',
  a4: 'iso_a4_210x297mm',
  a5: 'iso_a5_148x210mm',
  letter: 'na_letter_8.5x11in',
  legal: 'na_legal_8.5x14in',
};

/** orientation-requested code; unknown names print portrait */
export function orientationCode(orientation: string): number {
  return ORIENTATION_CODES[orientation.toLowerCase()] ?? ORIENTATION_CODES.portrait;
}

/** print-quality code; unknown names print normal */
export function qualityCode(quality: string): number {
  return QUALITY_CODES[quality.toLowerCase()] ?? QUALITY_CODES.normal;
}

export function sidesValue(duplex: boolean): string {
  return duplex ? 'two-sided-long-edge' : 'one-sided';
}

export function colorModeValue(color: boolean): string {
  return color ? 'color' : 'monochrome';
}

/** Map a paper size name onto its IPP media keyword */
export function mediaKeyword(media: string): string {
  return MEDIA_KEYWORDS[media.toLowerCase()] ?? media;
}

/**
 * Options for a plain submission, taken from the printer settings.
 */
export function defaultSpoolOptions(printer: ServiceSettings['printer']): SpoolOptions {
  return {
    media: printer.paper_size,
    orientation: printer.orientation,
    quality: printer.quality,
    duplex: printer.duplex,
    color: printer.color,
  };
}

/**
 * `key=value` pairs for the `lp -o` flags.
 */
export function toLpOptions(options: SpoolOptions): string[] {
  return [
    `media=${options.media}`,
    `orientation-requested=${orientationCode(options.orientation)}`,
    `print-quality=${qualityCode(options.quality)}`,
    `sides=${sidesValue(options.duplex)}`,
    `print-color-mode=${colorModeValue(options.color)}`,
  ];
}

/**
 * Full argument list for `lp`.
 */
export function buildLpArgs(
  printer: string,
  filePath: string,
  title: string,
  options: SpoolOptions
): string[] {
  const args = ['-d', printer, '-t', title];
  for (const option of toLpOptions(options)) {
    args.push('-o', option);
  }
  args.push(filePath);
  return args;
}

/**
 * Job template attributes for an IPP Print-Job request.
 */
export function toIppJobAttributes(options: SpoolOptions): IppGroup {
  return {
    media: mediaKeyword(options.media),
    'orientation-requested': orientationCode(options.orientation),
    'print-quality': qualityCode(options.quality),
    sides: sidesValue(options.duplex),
    'print-color-mode': colorModeValue(options.color),
  };
}
