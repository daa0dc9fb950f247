import { RenderError } from '../errors';
import { CommandRunner, runCommand } from '../utils/commandRunner';

export interface HtmlRenderOptions {
  pageSize: string;
  orientation: string;
}

export interface HtmlRenderer {
  /** Render an HTML file to a PDF file */
  render(htmlPath: string, pdfPath: string, options: HtmlRenderOptions): Promise<void>;
}

/**
 * HTML to PDF through the wkhtmltopdf binary.
 */
export class WkhtmltopdfRenderer implements HtmlRenderer {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly binary = 'wkhtmltopdf'
  ) {}

  static buildArgs(htmlPath: string, pdfPath: string, options: HtmlRenderOptions): string[] {
    const orientation = options.orientation.toLowerCase().includes('landscape')
      ? 'Landscape'
      : 'Portrait';

    return [
      '--quiet',
      '--encoding',
      'UTF-8',
      '--page-size',
      options.pageSize,
      '--orientation',
      orientation,
      '--margin-top',
      '20mm',
      '--margin-right',
      '20mm',
      '--margin-bottom',
      '20mm',
      '--margin-left',
      '20mm',
      '--disable-javascript',
      htmlPath,
      pdfPath,
    ];
  }

  async render(htmlPath: string, pdfPath: string, options: HtmlRenderOptions): Promise<void> {
    try {
      await this.run(this.binary, WkhtmltopdfRenderer.buildArgs(htmlPath, pdfPath, options));
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : undefined;
      throw RenderError.htmlConversionFailed(cause?.message ?? String(error), cause);
    }
  }
}
