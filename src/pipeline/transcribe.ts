import { fetch, File, FormData, type Dispatcher } from "undici";
import { PipelineFailure, TranscriptionFailure, errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { callWithTimeout } from "../utils/timeout.js";
import { downloadAudio } from "./download.js";

export interface Transcriber {
  transcribe(audioUrl: string): Promise<string>;
}

export interface WhisperTranscriberOptions {
  baseUrl: string; // OpenAI-compatible, e.g. https://api.openai.com/v1
  apiKey: string;
  model: string;
  language: string;
  timeoutMs: number;
  maxAudioBytes: number;
  logger: Logger;
  dispatcher?: Dispatcher;
}

/**
 * Downloads the clip and sends it to an OpenAI-compatible
 * `/audio/transcriptions` endpoint. Download and upload each get the full
 * timeout budget. No retries here.
 */
export function createWhisperTranscriber(opts: WhisperTranscriberOptions): Transcriber {
  const log = opts.logger.child({ component: "transcription" });

  return {
    async transcribe(audioUrl: string): Promise<string> {
      const audio = await downloadAudio(audioUrl, {
        maxBytes: opts.maxAudioBytes,
        timeoutMs: opts.timeoutMs,
        dispatcher: opts.dispatcher,
      });
      log.info({ bytes: audio.data.byteLength, format: audio.ext }, "audio downloaded");

      const form = new FormData();
      form.append("file", new File([audio.data], `audio.${audio.ext}`, { type: audio.mimeType }));
      form.append("model", opts.model);
      form.append("language", opts.language);
      form.append("response_format", "text");

      let text: string;
      try {
        text = await callWithTimeout("transcription request", opts.timeoutMs, async (signal) => {
          const res = await fetch(`${opts.baseUrl}/audio/transcriptions`, {
            method: "POST",
            headers: { Authorization: `Bearer ${opts.apiKey}` },
            body: form,
            signal,
            dispatcher: opts.dispatcher,
          });
          const body = await res.text();
          if (!res.ok) {
            throw new TranscriptionFailure(`transcription failed: ${res.status} ${body.slice(0, 200)}`);
          }
          return body;
        });
      } catch (err) {
        if (err instanceof PipelineFailure) throw err;
        throw new TranscriptionFailure(`transcription failed: ${errorMessage(err)}`, { cause: err });
      }

      const transcript = text.trim();
      if (!transcript) {
        throw new TranscriptionFailure("no speech recognised in audio");
      }
      log.info({ chars: transcript.length }, "transcription complete");
      return transcript;
    },
  };
}
