/**
 * Screenshot Writer Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileScreenshotWriter } from '../screenshot.writer';

describe('FileScreenshotWriter', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'crawl-shots-'));
  });

  afterEach(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should write a timestamped png named after the URL', async () => {
    const directory = path.join(tempDir, 'screenshots');
    const writer = new FileScreenshotWriter(directory);
    const takenAt = new Date(2024, 2, 5, 9, 7, 3);

    const location = await writer.save('https://example.com/a', Buffer.from('png-bytes'), takenAt);

    expect(location).toBe('screenshots/20240305_090703_example.com_a.png');
    const written = await fs.promises.readFile(path.join(directory, '20240305_090703_example.com_a.png'));
    expect(written.toString()).toBe('png-bytes');
  });

  it('should not overwrite a screenshot taken in the same second', async () => {
    const writer = new FileScreenshotWriter(tempDir, 'shots');
    const takenAt = new Date(2024, 2, 5, 9, 7, 3);

    const first = await writer.save('https://example.com/a', Buffer.from('one'), takenAt);
    const second = await writer.save('https://example.com/a', Buffer.from('two'), takenAt);

    expect(first).toBe('shots/20240305_090703_example.com_a.png');
    expect(second).toBe('shots/20240305_090703_example.com_a_2.png');
    const firstFile = await fs.promises.readFile(path.join(tempDir, '20240305_090703_example.com_a.png'));
    expect(firstFile.toString()).toBe('one');
  });
});
