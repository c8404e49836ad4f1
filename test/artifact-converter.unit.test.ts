// Unit tests for the external PDF converter wrapper
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConversionError, NotFoundError } from '../src/shared/utils/error-handling';
import { ArtifactConverter, convertedPathFor } from '../src/stages/artifact-converter';

let workDir: string;

async function writeScript(name: string, body: string): Promise<string> {
  const scriptPath = join(workDir, name);
  await fs.writeFile(scriptPath, `#!/bin/sh\n${body}\n`, 'utf8');
  await fs.chmod(scriptPath, 0o755);
  return scriptPath;
}

async function writePdf(name: string): Promise<string> {
  const pdfPath = join(workDir, name);
  await fs.writeFile(pdfPath, '%PDF-1.4 test', 'utf8');
  return pdfPath;
}

describe('Artifact Converter Unit Tests', () => {
  beforeEach(async () => {
    workDir = await fs.mkdtemp(join(tmpdir(), 'converter-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should derive the converted sibling path', () => {
    expect(convertedPathFor('/batch/1.pdf')).toBe('/batch/1.converted.pdf');
    expect(convertedPathFor('/batch/kit.PDF')).toBe('/batch/kit.converted.pdf');
  });

  it('should return the converted path when the converter succeeds', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'cp "$1" "${1%.pdf}.converted.pdf"') });
    const input = await writePdf('1.pdf');

    const output = await converter.convert(input);

    expect(output).toBe(join(workDir, '1.converted.pdf'));
    expect(await fs.readFile(output, 'utf8')).toBe('%PDF-1.4 test');
  });

  it('should report the exit code and stderr of a failed conversion', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'echo "bad input" >&2\nexit 3') });
    const input = await writePdf('1.pdf');

    const error = await converter.convert(input).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConversionError);
    if (error instanceof ConversionError) {
      expect(error.message).toBe('Converter failed for 1.pdf (exit 3). bad input');
      expect(error.exitCode).toBe(3);
      expect(error.output).toBe('bad input\n');
    }
  });

  it('should fall back to stdout when stderr is empty', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'echo "license expired"\nexit 2') });
    const input = await writePdf('3.pdf');

    await expect(converter.convert(input)).rejects.toThrow('Converter failed for 3.pdf (exit 2). license expired');
  });

  it('should fail when the converter exits cleanly without writing output', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'exit 0') });
    const input = await writePdf('5.pdf');

    await expect(converter.convert(input)).rejects.toThrow('Converter did not produce 5.converted.pdf');
  });

  it('should kill a converter that runs past the timeout', async () => {
    const converter = new ArtifactConverter({
      executablePath: await writeScript('convert.sh', 'exec sleep 5'),
      timeoutMs: 200
    });
    const input = await writePdf('1.pdf');

    await expect(converter.convert(input)).rejects.toThrow('Converter timed out for 1.pdf after 200 ms');
  });

  it('should report a missing input before starting the converter', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'exit 0') });

    await expect(converter.convert(join(workDir, 'missing.pdf'))).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should report a converter that is not configured', async () => {
    const converter = new ArtifactConverter({ executablePath: '' });
    const input = await writePdf('1.pdf');

    await expect(converter.convert(input)).rejects.toThrow('Converter not found: (not configured)');
  });

  it('should convert every variant', async () => {
    const converter = new ArtifactConverter({ executablePath: await writeScript('convert.sh', 'cp "$1" "${1%.pdf}.converted.pdf"') });
    const pdfPaths = {
      '1': await writePdf('1.pdf'),
      '3': await writePdf('3.pdf')
    };

    expect(await converter.convertAll(pdfPaths)).toEqual({
      '1': join(workDir, '1.converted.pdf'),
      '3': join(workDir, '3.converted.pdf')
    });
  });

  it('should stop at the first variant that fails', async () => {
    const converter = new ArtifactConverter({
      executablePath: await writeScript('convert.sh', 'case "$1" in *3.pdf) exit 1;; esac\ncp "$1" "${1%.pdf}.converted.pdf"')
    });
    const pdfPaths = {
      '1': await writePdf('1.pdf'),
      '3': await writePdf('3.pdf'),
      '5': await writePdf('5.pdf')
    };

    await expect(converter.convertAll(pdfPaths)).rejects.toThrow('Converter failed for 3.pdf (exit 1).');
    expect(await fs.access(join(workDir, '5.converted.pdf')).then(() => true, () => false)).toBe(false);
  });
});
