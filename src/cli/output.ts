import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { resetLogSink, setLogSink } from '../utils/logger.js';

export interface OutputStream {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface OutputStreams {
  stdout: OutputStream;
  stderr: OutputStream;
}

let jsonMode = false;
let streams: OutputStreams = { stdout: process.stdout, stderr: process.stderr };

export function setJsonOutput(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonOutput(): boolean {
  return jsonMode;
}

/** Redirect command output and log lines; tests install string collectors here. */
export function setOutputStreams(next: OutputStreams): void {
  streams = next;
  setLogSink(next.stderr);
}

export function resetOutputStreams(): void {
  streams = { stdout: process.stdout, stderr: process.stderr };
  resetLogSink();
}

/** Colours for `stream`, or none when it is not a terminal. */
function colorsFor(stream: OutputStream): ChalkInstance {
  return new Chalk({ level: stream.isTTY ? chalk.level : 0 });
}

export function errColors(): ChalkInstance {
  return colorsFor(streams.stderr);
}

export function writeOut(text: string): void {
  streams.stdout.write(text);
}

export function writeErr(text: string): void {
  streams.stderr.write(text);
}

export function printJson(data: unknown): void {
  writeOut(JSON.stringify(data, null, 2) + '\n');
}

export function printError(msg: string): void {
  if (jsonMode) {
    printJson({ status: 'error', message: msg });
  } else {
    writeErr(colorsFor(streams.stderr).red('✗ ') + msg + '\n');
  }
}

export function printWarning(msg: string): void {
  writeErr(colorsFor(streams.stderr).yellow('Warning: ') + msg + '\n');
}

export function printInfo(msg: string): void {
  writeErr(msg + '\n');
}
