import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Source of raw call-stack frames, one "at ..." line per frame
 */
export interface StackCaptureProvider {
  capture(): string[];
}

export class V8StackCaptureProvider implements StackCaptureProvider {
  constructor(private readonly frameLimit: number = 50) {}

  capture(): string[] {
    const previousLimit = Error.stackTraceLimit;
    Error.stackTraceLimit = this.frameLimit;
    try {
      const stack = new Error().stack ?? '';
      // first line is the "Error" header
      return stack.split('\n').slice(1);
    } finally {
      Error.stackTraceLimit = previousLimit;
    }
  }
}

export interface StackTraceFilterOptions {
  projectRoot?: string;
  libraryRoot?: string;
  provider?: StackCaptureProvider;
}

interface ParsedFrame {
  functionName?: string;
  location: string;
  file?: string;
  position?: string;
}

const FRAME_PATTERN = /^at\s+(?:async\s+)?(?:(.+?)\s+\((.+)\)|(.+))$/;
const LOCATION_PATTERN = /^(.+?):(\d+:\d+)$/;
const GENERATED_FUNCTIONS = [
  /(^|\.)(__awaiter|__generator|step|fulfilled|rejected)$/,
  /^Generator\.(next|throw|return)$/,
  /^new Promise$/,
  /^(process\.)?processTicksAndRejections$/,
  /<anonymous>/,
];

export class StackTraceFilter {
  readonly projectRoot: string;
  readonly libraryRoot: string;
  private readonly provider: StackCaptureProvider;
  private readonly projectToken: string;

  constructor(options: StackTraceFilterOptions = {}) {
    this.projectRoot = path.resolve(options.projectRoot ?? findProjectRoot());
    this.libraryRoot = path.resolve(options.libraryRoot ?? __dirname);
    this.provider = options.provider ?? new V8StackCaptureProvider();
    this.projectToken = path.basename(this.projectRoot);
  }

  /**
   * Captures the current call stack reduced to application frames,
   * innermost first
   */
  capture(maxLines: number): string[] {
    return this.filter(this.provider.capture(), maxLines);
  }

  filter(frames: readonly string[], maxLines: number): string[] {
    const result: string[] = [];
    const seen = new Set<string>();

    for (const raw of frames) {
      if (result.length >= maxLines) break;

      const frame = parseFrame(raw.trim());
      if (!frame || !this.isApplicationFrame(frame, raw)) continue;

      const line = this.toRelative(frame);
      if (seen.has(line)) continue;
      seen.add(line);
      result.push(line);
    }

    return result;
  }

  private isApplicationFrame(frame: ParsedFrame, raw: string): boolean {
    if (!frame.functionName) return false;
    if (GENERATED_FUNCTIONS.some(pattern => pattern.test(frame.functionName ?? ''))) return false;
    if (frame.location.includes('eval at') || frame.location.startsWith('<anonymous>')) return false;
    if (frame.location.startsWith('node:') || frame.location.startsWith('internal/')) return false;

    if (frame.file) {
      if (frame.file.split(/[\\/]/).includes('node_modules')) return false;
      if (isWithin(this.libraryRoot, frame.file)) return false;
      return isWithin(this.projectRoot, frame.file);
    }

    return this.projectToken.length > 0 && raw.includes(this.projectToken);
  }

  private toRelative(frame: ParsedFrame): string {
    if (!frame.file || !frame.position || !isWithin(this.projectRoot, frame.file)) {
      return `at ${frame.functionName} (${frame.location})`;
    }
    const relative = path.relative(this.projectRoot, frame.file).split(path.sep).join('/');
    return `at ${frame.functionName} (${relative}:${frame.position})`;
  }
}

function parseFrame(line: string): ParsedFrame | undefined {
  const match = FRAME_PATTERN.exec(line);
  if (!match) return undefined;

  const functionName = match[1];
  const location = match[2] ?? match[3] ?? '';
  const frame: ParsedFrame = { functionName, location };

  const locationMatch = LOCATION_PATTERN.exec(location);
  if (locationMatch) {
    let file = locationMatch[1];
    if (file.startsWith('file://')) {
      file = fileURLToPath(file);
    }
    if (path.isAbsolute(file)) {
      frame.file = file;
      frame.position = locationMatch[2];
    }
  }

  return frame;
}

function isWithin(directory: string, file: string): boolean {
  const relative = path.relative(directory, file);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Nearest ancestor of the working directory holding a package.json,
 * or the working directory itself
 */
export function findProjectRoot(start: string = process.cwd()): string {
  let directory = path.resolve(start);
  for (;;) {
    if (fs.existsSync(path.join(directory, 'package.json'))) {
      return directory;
    }
    const parent = path.dirname(directory);
    if (parent === directory) {
      return path.resolve(start);
    }
    directory = parent;
  }
}
