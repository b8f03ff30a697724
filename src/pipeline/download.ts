import { fetch, type Dispatcher } from "undici";
import {
  SUPPORTED_AUDIO_FORMATS,
  isSupportedAudioExtension,
  type AudioExtension,
} from "../constants.js";
import { PipelineFailure, TranscriptionFailure, errorMessage } from "../utils/errors.js";
import { callWithTimeout } from "../utils/timeout.js";

export interface AudioFormat {
  ext: AudioExtension;
  mimeType: string;
}

export interface DownloadedAudio extends AudioFormat {
  data: Buffer;
}

export interface DownloadOptions {
  maxBytes: number;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Format from the file extension of the URL path. Storage URLs carry the
 * object path percent-encoded (`users%2Fu1%2F123.m4a?alt=media`), so the
 * path is decoded first. No extension means wav.
 */
export function detectAudioFormat(audioUrl: string): AudioFormat {
  let url: URL;
  try {
    url = new URL(audioUrl);
  } catch (err) {
    throw new TranscriptionFailure(`invalid audio reference: ${audioUrl}`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new TranscriptionFailure(`unsupported audio reference scheme: ${url.protocol}`);
  }

  const path = decodeURIComponent(url.pathname);
  const lastSegment = path.slice(path.lastIndexOf("/") + 1);
  const match = /\.([A-Za-z0-9]+)$/.exec(lastSegment);
  const ext = match ? match[1].toLowerCase() : "wav";

  if (!isSupportedAudioExtension(ext)) {
    throw new TranscriptionFailure(`unsupported audio format: .${ext}`);
  }
  return { ext, mimeType: SUPPORTED_AUDIO_FORMATS[ext] };
}

/**
 * Fetches the clip into memory. Oversized audio is refused from the
 * Content-Length header when present, otherwise as soon as the streamed
 * body crosses the cap.
 */
export async function downloadAudio(audioUrl: string, opts: DownloadOptions): Promise<DownloadedAudio> {
  const format = detectAudioFormat(audioUrl);

  try {
    return await callWithTimeout("audio download", opts.timeoutMs, async (signal) => {
      const res = await fetch(audioUrl, { signal, dispatcher: opts.dispatcher });
      if (!res.ok) {
        await res.body?.cancel();
        throw new TranscriptionFailure(`audio download failed: HTTP ${res.status}`);
      }

      const declared = parseInt(res.headers.get("content-length") || "", 10);
      if (Number.isFinite(declared) && declared > opts.maxBytes) {
        await res.body?.cancel();
        throw new TranscriptionFailure(
          `audio exceeds ${opts.maxBytes} bytes (${declared} bytes declared)`
        );
      }

      const chunks: Buffer[] = [];
      let received = 0;
      if (res.body) {
        for await (const chunk of res.body) {
          const bytes: Uint8Array = chunk;
          received += bytes.byteLength;
          if (received > opts.maxBytes) {
            throw new TranscriptionFailure(`audio exceeds ${opts.maxBytes} bytes`);
          }
          chunks.push(Buffer.from(bytes));
        }
      }

      if (received === 0) {
        throw new TranscriptionFailure("audio download returned an empty body");
      }
      return { ...format, data: Buffer.concat(chunks) };
    });
  } catch (err) {
    if (err instanceof PipelineFailure) throw err;
    throw new TranscriptionFailure(`audio download failed: ${errorMessage(err)}`, { cause: err });
  }
}
