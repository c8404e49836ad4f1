// PDF conversion through the external converter executable
import { spawn } from 'child_process';
import { basename, dirname, extname, join } from 'path';
import { config } from '../../shared/utils/environment';
import { ConversionError, NotFoundError, errorMessage } from '../../shared/utils/error-handling';
import { fileExists } from '../../shared/utils/file-handler';

export interface ConverterOptions {
  executablePath?: string;
  /** 0 disables the timeout */
  timeoutMs?: number;
}

interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Sibling output path the converter is expected to write: 1.pdf -> 1.converted.pdf
 */
export function convertedPathFor(inputPath: string): string {
  const name = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${name}.converted.pdf`);
}

function runProcess(executablePath: string, inputPath: string, timeoutMs: number): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(executablePath, [inputPath], { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    let timedOut = false;

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.on('data', (chunk: string) => { stderr += chunk; });

    const timer = timeoutMs > 0
      ? setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs)
      : null;

    child.on('error', (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });

    child.on('close', (exitCode) => {
      if (timer) clearTimeout(timer);
      resolve({ exitCode, stdout, stderr, timedOut });
    });
  });
}

export class ArtifactConverter {
  private readonly executablePath: string;
  private readonly timeoutMs: number;

  constructor(options: ConverterOptions = {}) {
    this.executablePath = options.executablePath ?? config.converterPath;
    this.timeoutMs = options.timeoutMs ?? config.converterTimeoutMs;
  }

  /**
   * Converts one PDF and returns the converted file's path
   */
  async convert(inputPath: string): Promise<string> {
    if (!(await fileExists(inputPath))) {
      throw new NotFoundError(`Input PDF not found: ${inputPath}`, [inputPath]);
    }
    if (this.executablePath === '' || !(await fileExists(this.executablePath))) {
      throw new NotFoundError(`Converter not found: ${this.executablePath || '(not configured)'}`, [this.executablePath]);
    }

    const fileName = basename(inputPath);
    let result: ProcessResult;
    try {
      result = await runProcess(this.executablePath, inputPath, this.timeoutMs);
    } catch (error) {
      throw new ConversionError(`Failed to start PDF converter for ${fileName}: ${errorMessage(error)}`, null, '');
    }

    if (result.timedOut) {
      throw new ConversionError(`Converter timed out for ${fileName} after ${this.timeoutMs} ms`, result.exitCode, result.stdout);
    }

    if (result.exitCode !== 0) {
      const details = result.stderr.trim() === '' ? result.stdout : result.stderr;
      throw new ConversionError(
        `Converter failed for ${fileName} (exit ${result.exitCode}). ${details}`.trim(),
        result.exitCode,
        details
      );
    }

    const outputPath = convertedPathFor(inputPath);
    if (!(await fileExists(outputPath))) {
      throw new ConversionError(`Converter did not produce ${basename(outputPath)}`, result.exitCode, result.stdout);
    }

    return outputPath;
  }

  /**
   * Converts every variant before anything is uploaded
   */
  async convertAll(pdfPaths: Record<string, string>): Promise<Record<string, string>> {
    const converted: Record<string, string> = {};
    for (const [variant, inputPath] of Object.entries(pdfPaths)) {
      converted[variant] = await this.convert(inputPath);
      console.log('Converted PDF variant', { variant, outputPath: converted[variant] });
    }
    return converted;
  }
}
