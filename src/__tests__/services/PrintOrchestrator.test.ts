import { promises as fs } from 'fs';
import { DEFAULT_SERVICE_SETTINGS, ServiceSettings } from '../../config/serviceConfig';
import { PrinterManager } from '../../printing/PrinterManager';
import {
  PrintOrchestrator,
  attachmentTitle,
  buildMessageHeader,
  computeAttachmentWaitSeconds,
  messageTitle,
} from '../../services/PrintOrchestrator';
import { ServiceStats } from '../../services/serviceStats';
import { FakeHtmlRenderer, FakeSpooler, makeAttachment, makeMessage } from '../fixtures/fakes';

const EXPECTED_HEADER = [
  'From: Alice <alice@example.test>',
  'To: printer@example.test',
  'Subject: Quarterly report',
  'Date: Mon, 1 Jan 2024 10:00:00 +0000',
  '',
  '='.repeat(50),
  '',
  '',
].join('\n');

interface Setup {
  processing?: Partial<ServiceSettings['processing']>;
  ipp?: FakeSpooler | null;
}

function createOrchestrator(setup: Setup = {}) {
  const lp = new FakeSpooler('lp', false);
  const ipp = setup.ipp ?? null;
  const processing = { ...DEFAULT_SERVICE_SETTINGS.processing, max_pages_per_document: 0, ...setup.processing };
  const printerManager = new PrinterManager({
    printer: DEFAULT_SERVICE_SETTINGS.printer,
    processing,
    ipp,
    lp,
    sleep: async () => undefined,
  });
  const renderer = new FakeHtmlRenderer();
  const stats = new ServiceStats();
  const sleeps: number[] = [];
  const orchestrator = new PrintOrchestrator({
    printerManager,
    htmlRenderer: renderer,
    processing,
    printer: DEFAULT_SERVICE_SETTINGS.printer,
    stats,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { orchestrator, lp, renderer, stats, sleeps };
}

describe('computeAttachmentWaitSeconds', () => {
  const wait = DEFAULT_SERVICE_SETTINGS.processing.attachment_wait;

  it('should not wait without untracked submissions', () => {
    expect(computeAttachmentWaitSeconds(0, wait)).toBe(0);
  });

  it('should grow with the attachment count up to the cap', () => {
    expect(computeAttachmentWaitSeconds(1, wait)).toBe(7);
    expect(computeAttachmentWaitSeconds(3, wait)).toBe(11);
    expect(computeAttachmentWaitSeconds(20, wait)).toBe(30);
  });
});

describe('message formatting', () => {
  it('should build the header block', () => {
    expect(buildMessageHeader(makeMessage())).toBe(EXPECTED_HEADER);
  });

  it('should title jobs by subject', () => {
    expect(messageTitle(makeMessage({ subject: 'Invoice' }))).toBe('Email: Invoice');
  });

  it('should title attachment jobs by file name', () => {
    expect(attachmentTitle(makeAttachment({ filename: 'scan.pdf' }))).toBe('Attachment: scan.pdf');
  });
});

describe('PrintOrchestrator', () => {
  it('should print the text body with the header', async () => {
    const { orchestrator, lp, stats, sleeps } = createOrchestrator();

    await expect(orchestrator.processMessage(makeMessage())).resolves.toBe(true);

    expect(lp.submissions).toHaveLength(1);
    expect(lp.submissions[0].title).toBe('Email: Quarterly report');
    expect(lp.submissions[0].content.toString()).toBe(`${EXPECTED_HEADER}Hello printer`);
    expect(stats.snapshot().emailsPrinted).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('should print attachments instead of the body', async () => {
    const { orchestrator, lp, sleeps } = createOrchestrator();
    const message = makeMessage({
      attachments: [makeAttachment(), makeAttachment({ filename: 'notes.txt', data: Buffer.from('second') })],
    });

    await expect(orchestrator.processMessage(message)).resolves.toBe(true);

    expect(lp.submissions.map((s) => s.title)).toEqual(['Attachment: notes.txt', 'Attachment: notes.txt']);
    expect(lp.submissions.map((s) => s.content.toString())).toEqual(['attachment body\n', 'second']);
    expect(lp.submissions[1].filePath).toMatch(/notes_1\.txt$/);
    expect(sleeps).toEqual([9000]);
  });

  it('should print the body when attachment printing is off', async () => {
    const { orchestrator, lp } = createOrchestrator({ processing: { print_attachments: false } });

    await orchestrator.processMessage(makeMessage({ attachments: [makeAttachment()] }));

    expect(lp.submissions.map((s) => s.title)).toEqual(['Email: Quarterly report']);
  });

  it('should keep printing the other attachments when one fails', async () => {
    const { orchestrator, lp, stats, sleeps } = createOrchestrator();
    lp.failSubmitTitles.add('Attachment: broken.txt');
    const message = makeMessage({
      attachments: [makeAttachment({ filename: 'broken.txt' }), makeAttachment({ filename: 'fine.txt' })],
    });

    await expect(orchestrator.processMessage(message)).resolves.toBe(true);

    expect(lp.submissions.map((s) => s.title)).toEqual(['Attachment: fine.txt']);
    expect(stats.snapshot().printJobsFailed).toBe(1);
    expect(sleeps).toEqual([7000]);
  });

  it('should follow tracked attachments instead of sleeping', async () => {
    const ipp = new FakeSpooler('ipp', true);
    const { orchestrator, sleeps } = createOrchestrator({ ipp });

    await orchestrator.processMessage(makeMessage({ attachments: [makeAttachment()] }));

    expect(ipp.submissions).toHaveLength(1);
    expect(ipp.getJobsCalls).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it('should remove temporary files afterwards', async () => {
    const { orchestrator, lp } = createOrchestrator();

    await orchestrator.processMessage(makeMessage({ attachments: [makeAttachment()] }));

    await expect(fs.access(lp.submissions[0].filePath)).rejects.toThrow();
  });

  it('should render HTML bodies to PDF', async () => {
    const { orchestrator, lp, renderer } = createOrchestrator();
    const message = makeMessage({ htmlBody: '<p>Hello <b>printer</b></p>' });

    await orchestrator.processMessage(message);

    expect(renderer.rendered).toHaveLength(1);
    expect(renderer.rendered[0].options).toEqual({ pageSize: 'A4', orientation: 'portrait' });
    expect(renderer.rendered[0].html).toContain('From: Alice &lt;alice@example.test&gt;');
    expect(renderer.rendered[0].html).toContain('<p>Hello <b>printer</b></p>');
    expect(lp.submissions).toHaveLength(1);
    expect(lp.submissions[0].filePath).toMatch(/email\.pdf$/);
    expect(lp.submissions[0].content.toString()).toBe('%PDF-1.4 fake');
  });

  it('should send HTML directly when PDF conversion is off', async () => {
    const { orchestrator, lp, renderer } = createOrchestrator({
      processing: { convert_html_to_pdf: false },
    });

    await orchestrator.processMessage(makeMessage({ htmlBody: '<p>Hi</p>' }));

    expect(renderer.rendered).toHaveLength(0);
    expect(lp.submissions[0].filePath).toMatch(/email\.html$/);
  });

  it('should fall back to the text body when HTML rendering fails', async () => {
    const { orchestrator, lp, renderer, stats } = createOrchestrator();
    renderer.fail = true;

    await expect(orchestrator.processMessage(makeMessage({ htmlBody: '<p>Hi</p>' }))).resolves.toBe(true);

    expect(lp.submissions).toHaveLength(1);
    expect(lp.submissions[0].content.toString()).toBe(`${EXPECTED_HEADER}Hello printer`);
    expect(stats.snapshot().printJobsFailed).toBe(0);
  });

  it('should count a failure when HTML fails and there is no text', async () => {
    const { orchestrator, lp, renderer, stats } = createOrchestrator();
    renderer.fail = true;

    await expect(
      orchestrator.processMessage(makeMessage({ textBody: '', htmlBody: '<p>Hi</p>' }))
    ).resolves.toBe(false);

    expect(lp.submissions).toHaveLength(0);
    expect(stats.snapshot().printJobsFailed).toBe(1);
    expect(stats.snapshot().emailsPrinted).toBe(0);
  });

  it('should skip messages with nothing printable', async () => {
    const { orchestrator, lp } = createOrchestrator({ processing: { print_text_emails: false } });

    await expect(orchestrator.processMessage(makeMessage())).resolves.toBe(false);
    expect(lp.submissions).toHaveLength(0);
  });

  it('should count a page-limit rejection as rejected, not failed', async () => {
    const { orchestrator, lp, stats } = createOrchestrator({
      processing: { max_pages_per_document: 1 },
    });
    // 200 lines estimate to 3 pages
    const longText = Buffer.from(`${'line\n'.repeat(199)}last`);

    await expect(
      orchestrator.processMessage(
        makeMessage({ attachments: [makeAttachment({ filename: 'long.txt', data: longText })] })
      )
    ).resolves.toBe(false);

    expect(lp.submissions).toHaveLength(0);
    expect(stats.snapshot()).toMatchObject({ printJobsFailed: 0, documentsRejected: 1 });
  });

  it('should count an unsupported image type as rejected, not failed', async () => {
    const { orchestrator, lp, stats, sleeps } = createOrchestrator();
    const message = makeMessage({
      attachments: [
        makeAttachment({ filename: 'a.gif', contentType: 'image/gif', data: Buffer.from('GIF89a') }),
        makeAttachment({ filename: 'fine.txt' }),
      ],
    });

    await expect(orchestrator.processMessage(message)).resolves.toBe(true);

    expect(lp.submissions.map((s) => s.title)).toEqual(['Attachment: fine.txt']);
    expect(stats.snapshot()).toMatchObject({
      emailsPrinted: 1,
      printJobsFailed: 0,
      documentsRejected: 1,
    });
    expect(sleeps).toEqual([7000]);
  });

  it('should count a rejected text body as rejected, not failed', async () => {
    const { orchestrator, lp, stats } = createOrchestrator({
      processing: { max_pages_per_document: 1 },
    });

    await expect(
      orchestrator.processMessage(makeMessage({ textBody: 'line\n'.repeat(300) }))
    ).resolves.toBe(false);

    expect(lp.submissions).toHaveLength(0);
    expect(stats.snapshot()).toMatchObject({ printJobsFailed: 0, documentsRejected: 1 });
  });

  it('should isolate failures within a batch', async () => {
    const { orchestrator, lp, stats } = createOrchestrator();
    lp.failSubmitTitles.add('Email: Two');

    await orchestrator.processBatch([
      makeMessage({ subject: 'One' }),
      makeMessage({ subject: 'Two' }),
      makeMessage({ subject: 'Three' }),
    ]);

    expect(lp.submissions.map((s) => s.title)).toEqual(['Email: One', 'Email: Three']);
    expect(stats.snapshot()).toMatchObject({
      emailsProcessed: 3,
      emailsPrinted: 2,
      printJobsFailed: 1,
    });
  });
});
