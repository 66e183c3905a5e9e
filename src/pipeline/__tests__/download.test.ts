import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { downloadFile, getUrlFilename, isUrl } from "../download.js";
import { DownloadError } from "../../utils/errors.js";

const payload = Buffer.alloc(64 * 1024, 7);

describe("downloadFile", () => {
  let server: http.Server;
  let baseUrl: string;
  let dir: string;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      if (req.url === "/ggml-tiny.bin") {
        res.writeHead(200, { "Content-Length": payload.length });
        res.end(payload);
      } else if (req.url === "/moved") {
        res.writeHead(302, { Location: "/ggml-tiny.bin" });
        res.end();
      } else {
        res.writeHead(404);
        res.end("not here");
      }
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "download-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the body to the destination and reports progress", async () => {
    const destination = path.join(dir, "nested", "ggml-tiny.bin");
    const progress: Array<[number, number]> = [];
    const result = await downloadFile(`${baseUrl}/ggml-tiny.bin`, destination, {
      onProgress: (done, total) => progress.push([done, total]),
    });

    expect(result).toBe(destination);
    expect(fs.readFileSync(destination).equals(payload)).toBe(true);
    expect(progress.at(-1)).toEqual([payload.length, payload.length]);
    expect(fs.readdirSync(path.dirname(destination))).toEqual(["ggml-tiny.bin"]);
  });

  it("follows redirects", async () => {
    const destination = path.join(dir, "moved.bin");
    await downloadFile(`${baseUrl}/moved`, destination);
    expect(fs.statSync(destination).size).toBe(payload.length);
  });

  it("raises DownloadError on an error status and leaves nothing behind", async () => {
    const destination = path.join(dir, "missing.bin");
    const download = downloadFile(`${baseUrl}/missing`, destination);
    await expect(download).rejects.toBeInstanceOf(DownloadError);
    await expect(download).rejects.toThrow("Download failed: 404 not here");
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const download = downloadFile(`${baseUrl}/ggml-tiny.bin`, path.join(dir, "tiny.bin"), {
      signal: controller.signal,
    });
    await expect(download).rejects.toBeInstanceOf(DownloadError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});

describe("URL helpers", () => {
  it("recognises http(s) URLs only", () => {
    expect(isUrl("https://example.com/talk.mp4")).toBe(true);
    expect(isUrl("http://localhost:8080/a.wav")).toBe(true);
    expect(isUrl("ftp://example.com/a.wav")).toBe(false);
    expect(isUrl("/videos/talk.mp4")).toBe(false);
  });

  it("takes the file name from the URL path", () => {
    expect(getUrlFilename("https://example.com/media/My%20Talk.mp4?x=1")).toBe("My Talk.mp4");
    expect(getUrlFilename("https://example.com/")).toBe("download");
  });
});
