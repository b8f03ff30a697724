import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MockAgent } from "undici";
import { detectAudioFormat, downloadAudio } from "../src/pipeline/download.js";
import { TimeoutFailure, TranscriptionFailure } from "../src/utils/errors.js";

describe("detectAudioFormat", () => {
  it("reads the extension from a percent-encoded storage path", () => {
    expect(detectAudioFormat("https://storage.test/v0/b/app/o/users%2Fu1%2Fclip.M4A?alt=media&token=t")).toEqual({
      ext: "m4a",
      mimeType: "audio/mp4",
    });
  });

  it("defaults to wav when the path has no extension", () => {
    expect(detectAudioFormat("https://storage.test/clips/abc")).toEqual({ ext: "wav", mimeType: "audio/wav" });
  });

  it("rejects unsupported extensions", () => {
    expect(() => detectAudioFormat("https://storage.test/notes.txt")).toThrow(
      new TranscriptionFailure("unsupported audio format: .txt")
    );
  });

  it("rejects non-http references", () => {
    expect(() => detectAudioFormat("ftp://storage.test/clip.mp3")).toThrow("unsupported audio reference scheme: ftp:");
    expect(() => detectAudioFormat("not a url")).toThrow(TranscriptionFailure);
  });
});

describe("downloadAudio", () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const opts = () => ({ maxBytes: 16, timeoutMs: 1000, dispatcher: agent });

  it("returns the clip bytes with their format", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/a.mp3" }).reply(200, Buffer.from("ID3audio"));

    const audio = await downloadAudio("https://storage.test/clips/a.mp3", opts());
    expect(audio.ext).toBe("mp3");
    expect(audio.mimeType).toBe("audio/mpeg");
    expect(audio.data.toString()).toBe("ID3audio");
  });

  it("fails on an error status", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/missing.m4a" }).reply(404, "not found");

    await expect(downloadAudio("https://storage.test/clips/missing.m4a", opts())).rejects.toThrow(
      new TranscriptionFailure("audio download failed: HTTP 404")
    );
  });

  it("refuses audio whose declared size is over the cap", async () => {
    agent
      .get("https://storage.test")
      .intercept({ path: "/clips/big.wav" })
      .reply(200, Buffer.alloc(64), { headers: { "content-length": "64" } });

    await expect(downloadAudio("https://storage.test/clips/big.wav", opts())).rejects.toThrow(
      "audio exceeds 16 bytes (64 bytes declared)"
    );
  });

  it("stops a body without a declared size once it crosses the cap", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/stream.wav" }).reply(200, Buffer.alloc(64));

    await expect(downloadAudio("https://storage.test/clips/stream.wav", opts())).rejects.toThrow(
      new TranscriptionFailure("audio exceeds 16 bytes")
    );
  });

  it("fails on an empty body", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/empty.wav" }).reply(200, "");

    await expect(downloadAudio("https://storage.test/clips/empty.wav", opts())).rejects.toThrow(
      "audio download returned an empty body"
    );
  });

  it("turns a network error into a TranscriptionFailure", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/a.ogg" }).replyWithError(new Error("socket hang up"));

    await expect(downloadAudio("https://storage.test/clips/a.ogg", opts())).rejects.toBeInstanceOf(
      TranscriptionFailure
    );
  });

  it("reports a stalled download as a TimeoutFailure", async () => {
    agent.get("https://storage.test").intercept({ path: "/clips/slow.wav" }).reply(200, "RIFF").delay(500);

    await expect(
      downloadAudio("https://storage.test/clips/slow.wav", { ...opts(), timeoutMs: 20 })
    ).rejects.toBeInstanceOf(TimeoutFailure);
  });
});
