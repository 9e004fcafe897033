/**
 * Video tooling
 *
 * Duration probing with ffprobe and size-bounded, re-encode-free splitting
 * with ffmpeg's segment muxer. Segments are written into a temporary
 * directory beside the source file; the caller releases it.
 *
 * @module services/ingestion/video-tools
 */

import { execFile } from 'child_process';
import fs from 'fs';
import path from 'path';
import { promisify } from 'util';
import { VideoToolError } from './errors.js';

const execFileAsync = promisify(execFile);

/** Lower bound on the computed segment length */
const MIN_SEGMENT_SECS = 5;

/** Safety factor applied to the bitrate-derived segment length */
const SEGMENT_SAFETY_FACTOR = 0.98;

export interface VideoSegments {
  /** Segment paths in playback order; the source itself when not split */
  paths: string[];
  /** Remove temporary segment files; safe to call more than once */
  release(): Promise<void>;
}

export interface VideoTools {
  probeDuration(filePath: string): Promise<number>;
  splitBySize(filePath: string, durationSecs: number): Promise<VideoSegments>;
}

export interface VideoSplitOptions {
  /** Files larger than this are split (default: 100 MiB) */
  segmentLimitBytes: number;
  /** Segment length when the bitrate is unknown (default: 300) */
  fallbackSegmentSecs: number;
}

/**
 * Seconds per segment so each segment stays under the byte limit.
 */
export function segmentSeconds(
  sizeBytes: number,
  durationSecs: number,
  options: VideoSplitOptions
): number {
  const bytesPerSec = durationSecs > 0 ? sizeBytes / durationSecs : 0;
  if (bytesPerSec <= 0) return options.fallbackSegmentSecs;
  return Math.max(MIN_SEGMENT_SECS, (options.segmentLimitBytes / bytesPerSec) * SEGMENT_SAFETY_FACTOR);
}

function isMissingBinary(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * VideoTools over the ffprobe and ffmpeg binaries on PATH
 */
export class FfmpegVideoTools implements VideoTools {
  constructor(
    private readonly options: VideoSplitOptions,
    private readonly binaries: { ffprobe: string; ffmpeg: string } = {
      ffprobe: 'ffprobe',
      ffmpeg: 'ffmpeg',
    }
  ) {}

  async probeDuration(filePath: string): Promise<number> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(this.binaries.ffprobe, [
        '-v',
        'error',
        '-show_entries',
        'format=duration',
        '-of',
        'default=noprint_wrappers=1:nokey=1',
        filePath,
      ]));
    } catch (error) {
      if (isMissingBinary(error)) {
        throw new VideoToolError(
          `ffprobe not found; install ffmpeg to ingest ${filePath}`,
          'VIDEO_TOOL_MISSING',
          filePath,
          'ffprobe'
        );
      }
      throw new VideoToolError(
        `Failed to inspect video duration for ${filePath}`,
        'VIDEO_PROBE_FAILED',
        filePath,
        'ffprobe',
        { cause: error instanceof Error ? error.message : String(error) }
      );
    }

    const duration = Number.parseFloat(stdout.trim());
    if (!Number.isFinite(duration)) {
      throw new VideoToolError(
        `Failed to inspect video duration for ${filePath}: "${stdout.trim()}"`,
        'VIDEO_PROBE_FAILED',
        filePath,
        'ffprobe'
      );
    }
    return duration;
  }

  async splitBySize(filePath: string, durationSecs: number): Promise<VideoSegments> {
    const { size } = await fs.promises.stat(filePath);
    if (size <= this.options.segmentLimitBytes) {
      return { paths: [filePath], release: async () => undefined };
    }

    const parsed = path.parse(filePath);
    const tempDir = await fs.promises.mkdtemp(path.join(parsed.dir, `${parsed.name}_parts_`));
    let released = false;
    const release = async (): Promise<void> => {
      if (released) return;
      released = true;
      await fs.promises.rm(tempDir, { recursive: true, force: true });
    };

    const secs = segmentSeconds(size, durationSecs, this.options);
    const pattern = path.join(tempDir, `${parsed.name}_part_%03d${parsed.ext}`);
    console.error(
      `[VideoTools] Splitting ${parsed.base} (${size} bytes) into ${secs.toFixed(1)}s segments`
    );

    try {
      await execFileAsync(this.binaries.ffmpeg, [
        '-hide_banner',
        '-loglevel',
        'error',
        '-y',
        '-i',
        filePath,
        '-c',
        'copy',
        '-map',
        '0',
        '-f',
        'segment',
        '-segment_time',
        secs.toFixed(3),
        '-reset_timestamps',
        '1',
        pattern,
      ]);
    } catch (error) {
      await release();
      if (isMissingBinary(error)) {
        throw new VideoToolError(
          `ffmpeg not found; install ffmpeg to ingest ${filePath}`,
          'VIDEO_TOOL_MISSING',
          filePath,
          'ffmpeg'
        );
      }
      throw new VideoToolError(`Failed to split video ${filePath}`, 'VIDEO_SPLIT_FAILED', filePath, 'ffmpeg', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const prefix = `${parsed.name}_part_`;
    const entries = await fs.promises.readdir(tempDir);
    const paths = entries
      .filter((name) => name.startsWith(prefix) && name.endsWith(parsed.ext))
      .sort()
      .map((name) => path.join(tempDir, name));

    return { paths, release };
  }
}
