import { Readable } from "node:stream";
import { HttpService } from "@nestjs/axios";
import { ConfigService } from "@nestjs/config";
import { Test, TestingModule } from "@nestjs/testing";
import { of, throwError } from "rxjs";
import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpClientService, readBodyPreview } from "./http-client.service.js";
import { ProbeTimeoutError } from "./types.js";

const { undiciRequestMock } = vi.hoisted(() => ({
  undiciRequestMock: vi.fn(),
}));

vi.mock("undici", () => ({
  Agent: class {
    close = vi.fn(async () => undefined);
  },
  request: undiciRequestMock,
}));

describe("HttpClientService", () => {
  const mockHttpService = {
    request: vi.fn(),
  };

  let httpVersion: "1.1" | "2" = "1.1";

  const mockConfigService = {
    get: vi.fn((key: string) => {
      if (key === "probe") {
        return {
          batchSize: 100,
          concurrency: 10,
          requestTimeoutMs: 30000,
          httpVersion,
          nonActiveMode: "skip",
          userAgent: "retrieval-audit/test",
        };
      }
      return undefined;
    }),
  };

  afterEach(() => {
    vi.clearAllMocks();
    httpVersion = "1.1";
  });

  const createService = async (): Promise<HttpClientService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HttpClientService,
        { provide: HttpService, useValue: mockHttpService },
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    return module.get<HttpClientService>(HttpClientService);
  };

  describe("HTTP/1.1", () => {
    it("sends HEAD requests with the configured timeout and user agent", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(
        of({ status: 200, headers: { "content-length": "4096" }, data: Readable.from([]) }),
      );

      const response = await service.probe("http://sp.test/piece/abc", { method: "HEAD" });

      const config = mockHttpService.request.mock.calls[0][0];
      expect(config.method).toBe("HEAD");
      expect(config.timeout).toBe(30000);
      expect(config.maxRedirects).toBe(0);
      expect(config.headers["User-Agent"]).toBe("retrieval-audit/test");
      expect(response.statusCode).toBe(200);
      expect(response.contentLength).toBe(4096);
      expect(response.bodyPreview).toBeNull();
      expect(response.httpVersion).toBe("1.1");
    });

    it("reads a truncated body preview for non-2xx GET responses", async () => {
      const service = await createService();
      mockHttpService.request.mockReturnValueOnce(
        of({ status: 500, headers: {}, data: Readable.from([Buffer.from("e".repeat(1500))]) }),
      );

      const response = await service.probe("http://sp.test/ipfs/bafy", { method: "GET" });

      expect(mockHttpService.request.mock.calls[0][0].maxRedirects).toBe(5);
      expect(response.statusCode).toBe(500);
      expect(response.bodyPreview).toBe("e".repeat(1024));
      expect(response.contentLength).toBeNull();
    });

    it("does not read the body of a successful GET", async () => {
      const service = await createService();
      const body = Readable.from([Buffer.from("payload")]);
      mockHttpService.request.mockReturnValueOnce(of({ status: 200, headers: {}, data: body }));

      const response = await service.probe("http://sp.test/ipfs/bafy", { method: "GET" });

      expect(response.bodyPreview).toBeNull();
      expect(body.destroyed).toBe(true);
    });

    it("maps axios timeouts to ProbeTimeoutError", async () => {
      const service = await createService();
      const timeoutError = Object.assign(new Error("timeout of 30000ms exceeded"), {
        isAxiosError: true,
        code: "ECONNABORTED",
      });
      mockHttpService.request.mockReturnValueOnce(throwError(() => timeoutError));

      await expect(service.probe("http://sp.test/piece/abc", { method: "HEAD" })).rejects.toBeInstanceOf(
        ProbeTimeoutError,
      );
    });

    it("rethrows other transport errors unchanged", async () => {
      const service = await createService();
      const refused = new Error("connect ECONNREFUSED 127.0.0.1:80");
      mockHttpService.request.mockReturnValueOnce(throwError(() => refused));

      await expect(service.probe("http://sp.test/piece/abc", { method: "HEAD" })).rejects.toBe(refused);
    });
  });

  describe("HTTP/2", () => {
    it("uses undici and reports the negotiated version", async () => {
      httpVersion = "2";
      const service = await createService();
      undiciRequestMock.mockResolvedValueOnce({
        statusCode: 404,
        headers: { "content-length": "9" },
        body: Readable.from([Buffer.from("not found")]),
      });

      const response = await service.probe("http://sp.test/piece/abc", { method: "GET" });

      expect(undiciRequestMock).toHaveBeenCalledTimes(1);
      expect(mockHttpService.request).not.toHaveBeenCalled();
      expect(response).toMatchObject({
        statusCode: 404,
        contentLength: 9,
        bodyPreview: "not found",
        httpVersion: "2",
      });
    });

    it("throws ProbeTimeoutError once the request timeout elapses", async () => {
      httpVersion = "2";
      const service = await createService();
      undiciRequestMock.mockImplementationOnce((_url: string, options: { signal?: AbortSignal }) => {
        return new Promise((_resolve, reject) => {
          options.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
      });

      await expect(
        service.probe("http://sp.test/piece/abc", { method: "HEAD", timeoutMs: 20 }),
      ).rejects.toThrow("Request to http://sp.test/piece/abc timed out after 20ms");
    });
  });
});

describe("readBodyPreview", () => {
  it("joins chunks until the limit and destroys the stream", async () => {
    const body = Readable.from([Buffer.from("abc"), Buffer.from("def"), Buffer.from("ghi")]);

    const preview = await readBodyPreview(body, 5);

    expect(preview).toBe("abcde");
    expect(body.destroyed).toBe(true);
  });

  it("returns an empty string for an empty body", async () => {
    await expect(readBodyPreview(Readable.from([]), 1024)).resolves.toBe("");
  });
});
