import { TextCleaningService } from '../services/TextCleaningService';
import { TextExtractionService } from '../services/TextExtractionService';
import { InputError } from '../utils/errors';

describe('TextCleaningService', () => {
  const cleaner = new TextCleaningService();

  it('normalizes whitespace and drops page furniture', () => {
    const raw = 'Line one  \r\nPage 2 of 5\r\n\r\n\r\n\tLine\ttwo\n- 3 -\n';

    expect(cleaner.cleanText(raw)).toBe('Line one\n\nLine two');
  });

  it('can leave page markers in place', () => {
    const keepMarkers = new TextCleaningService({ stripPageFurniture: false });

    expect(keepMarkers.cleanText('Intro\nPage 2 of 5\nBody')).toBe('Intro\nPage 2 of 5\nBody');
  });

  it('keeps paragraph breaks', () => {
    expect(cleaner.cleanText('First paragraph.\n\nSecond paragraph.')).toBe('First paragraph.\n\nSecond paragraph.');
  });
});

describe('TextExtractionService', () => {
  const extractor = new TextExtractionService();

  it('reads plain text files', async () => {
    await expect(extractor.extractText(Buffer.from('hello world'), 'text/plain', 'notes.txt')).resolves.toEqual({
      text: 'hello world'
    });
  });

  it('trusts a text extension over a generic mimetype', async () => {
    const result = await extractor.extractText(Buffer.from('# Title'), 'application/octet-stream', 'README.md');

    expect(result.text).toBe('# Title');
  });

  it('rejects unsupported types', async () => {
    await expect(extractor.extractText(Buffer.from('MZ'), 'application/octet-stream', 'tool.exe')).rejects.toThrow(
      InputError
    );
  });

  it('reports unreadable DOCX files as input errors', async () => {
    await expect(extractor.extractText(Buffer.from('not a zip'), 'application/octet-stream', 'broken.docx')).rejects.toThrow(
      'Failed to extract text from DOCX'
    );
  });

  it('knows which uploads it can handle', () => {
    expect(extractor.isSupported('application/pdf', 'report')).toBe(true);
    expect(extractor.isSupported('application/octet-stream', 'data.csv')).toBe(true);
    expect(extractor.isSupported('image/png', 'photo.png')).toBe(false);
  });
});
