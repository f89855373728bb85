import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createServer, type Server } from "net";
import { request, type IncomingMessage } from "http";
import { join } from "path";
import {
  createMockLogger,
  createSilentLogger,
  createTempSite,
  type TempSite,
} from "@file-serve/test-utils";
import { ServerManager } from "../../src/server-manager";
import { ServerStartupError } from "../../src/errors";

const INDEX_HTML = "<html><body>Integration</body></html>";

function listen(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.once("error", reject);
    server.listen(port, "127.0.0.1", () => resolve(server));
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Send a request with the path written to the wire exactly as given
 */
function rawGet(
  port: number,
  path: string,
): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = request(
      { host: "127.0.0.1", port, path, method: "GET", agent: false },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf8"),
          }),
        );
        res.on("error", reject);
      },
    );
    req.on("error", reject);
    req.end();
  });
}

describe("ServerManager", () => {
  let site: TempSite;
  let rootDir: string;
  let serverManager: ServerManager;

  beforeEach(async () => {
    site = await createTempSite({
      "secret.txt": "top secret",
      "www/index.html": INDEX_HTML,
      "www/files/a.txt": "alpha",
      "www/files/b.txt": "bravo",
      "www/odd/q#x.txt": "q#x.txt",
      "www/odd/a&b.txt": "a&b.txt",
      "www/odd/plus+sign.txt": "plus+sign.txt",
      "www/odd/semi;colon,comma.txt": "semi;colon,comma.txt",
      "www/odd/at@dollar$.txt": "at@dollar$.txt",
      "www/odd/eq=colon:.txt": "eq=colon:.txt",
      "www/odd/100%.txt": "100%.txt",
      "www/odd/a b.txt": "a b.txt",
      "www/odd/café.txt": "café.txt",
    });
    rootDir = join(site.dir, "www");
    serverManager = new ServerManager({
      logger: createSilentLogger("server-manager-test"),
      config: { port: 0, hostname: "127.0.0.1", rootDir },
    });
  });

  afterEach(async () => {
    if (serverManager.getStatus().running) {
      await serverManager.stop();
    }
    await site.cleanup();
  });

  describe("start", () => {
    it("should bind an ephemeral port and report its URL", async () => {
      const address = await serverManager.start();

      expect(address.hostname).toBe("127.0.0.1");
      expect(address.port).toBeGreaterThan(0);
      expect(address.url).toBe(`http://127.0.0.1:${address.port}`);
      expect(serverManager.getStatus()).toEqual({
        running: true,
        url: address.url,
        rootDir,
      });
    });

    it("should return the existing address if already running", async () => {
      const logger = createMockLogger();
      serverManager = new ServerManager({
        logger,
        config: { port: 0, hostname: "127.0.0.1", rootDir },
      });

      const first = await serverManager.start();
      const second = await serverManager.start();

      expect(second).toEqual(first);
      expect(logger.warn).toHaveBeenCalledWith("File server already running");
    });

    it("should fail with ServerStartupError when the port is taken", async () => {
      const blocker = await listen(0);
      const info = blocker.address();
      const port = info !== null && typeof info === "object" ? info.port : 0;

      serverManager = new ServerManager({
        logger: createSilentLogger(),
        config: { port, hostname: "127.0.0.1", rootDir },
      });

      try {
        const failure = await serverManager.start().then(
          () => null,
          (error: unknown) => error,
        );

        expect(failure).toBeInstanceOf(ServerStartupError);
        expect(failure).toMatchObject({
          message: `Failed to initialize file server: address 127.0.0.1:${port} is already in use`,
          context: { hostname: "127.0.0.1", port, code: "EADDRINUSE" },
        });
        expect(serverManager.getStatus().running).toBe(false);
      } finally {
        await close(blocker);
      }
    });

    it("should fail when the root directory does not exist", async () => {
      serverManager = new ServerManager({
        logger: createSilentLogger(),
        config: {
          port: 0,
          hostname: "127.0.0.1",
          rootDir: join(site.dir, "nope"),
        },
      });

      await expect(serverManager.start()).rejects.toThrow(
        `Failed to initialize file server: Root directory "${join(site.dir, "nope")}" not found`,
      );
    });

    it("should refuse to start with an aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(serverManager.start(controller.signal)).rejects.toThrow(
        "Failed to initialize file server: start was aborted",
      );
    });
  });

  describe("serving", () => {
    it("should serve index.html byte for byte at /", async () => {
      const { url } = await serverManager.start();

      const response = await fetch(`${url}/`);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe(INDEX_HTML);
    });

    it("should return 404 for a missing file and keep serving", async () => {
      const { url } = await serverManager.start();

      const missing = await fetch(`${url}/nothing-here.txt`);
      expect(missing.status).toBe(404);
      await missing.text();

      const present = await fetch(`${url}/files/a.txt`);
      expect(present.status).toBe(200);
      expect(await present.text()).toBe("alpha");
    });

    it("should list a directory without index.html", async () => {
      const { url } = await serverManager.start();

      const response = await fetch(`${url}/files/`);
      const body = await response.text();

      expect(response.status).toBe(200);
      expect(body).toContain('<li><a href="a.txt">a.txt</a></li>');
      expect(body).toContain('<li><a href="b.txt">b.txt</a></li>');
    });

    it("should serve every file linked from a listing", async () => {
      const { url } = await serverManager.start();

      const listing = await fetch(`${url}/odd/`);
      const hrefs = [...(await listing.text()).matchAll(/href="([^"]+)"/g)]
        .map((match) => match[1] ?? "");

      expect(hrefs).toHaveLength(9);
      for (const href of hrefs) {
        const response = await fetch(`${url}/odd/${href}`);

        expect(response.status).toBe(200);
        expect(await response.text()).toBe(decodeURIComponent(href));
      }
    });

    it("should not leak files above the root", async () => {
      const { port } = await serverManager.start();

      for (const path of ["/../secret.txt", "/..%2fsecret.txt"]) {
        const response = await rawGet(port, path);

        expect([400, 404]).toContain(response.status);
        expect(response.body).not.toBe("top secret");
      }
    });
  });

  describe("stop", () => {
    it("should free the port for rebinding", async () => {
      const { port } = await serverManager.start();
      const warmup = await fetch(`http://127.0.0.1:${port}/files/a.txt`);
      await warmup.text();

      await serverManager.stop();

      expect(serverManager.getStatus()).toEqual({
        running: false,
        url: undefined,
        rootDir,
      });
      const rebound = await listen(port);
      await close(rebound);
    });

    it("should not wait for a download that is still being read", async () => {
      const big = await createTempSite({
        "big.bin": new Uint8Array(32 * 1024 * 1024),
      });
      const manager = new ServerManager({
        logger: createSilentLogger(),
        config: { port: 0, hostname: "127.0.0.1", rootDir: big.dir },
      });
      const clientErrors: Error[] = [];

      try {
        const { port } = await manager.start();
        const response = await new Promise<IncomingMessage>(
          (resolve, reject) => {
            const req = request(
              { host: "127.0.0.1", port, path: "/big.bin", agent: false },
              resolve,
            );
            req.on("error", (error) => {
              clientErrors.push(error);
              reject(error);
            });
            req.end();
          },
        );
        response.on("error", (error) => clientErrors.push(error));
        response.pause();

        expect(response.statusCode).toBe(200);

        await manager.stop();

        expect(manager.getStatus().running).toBe(false);
      } finally {
        await big.cleanup();
      }
    });

    it("should stop when the start signal is aborted", async () => {
      const logger = createMockLogger();
      serverManager = new ServerManager({
        logger,
        config: { port: 0, hostname: "127.0.0.1", rootDir },
      });
      const controller = new AbortController();
      const { port } = await serverManager.start(controller.signal);

      controller.abort();

      await vi.waitFor(() => {
        expect(logger.info).toHaveBeenCalledWith("File server stopped");
      });
      expect(serverManager.getStatus().running).toBe(false);
      const rebound = await listen(port);
      await close(rebound);
    });

    it("should warn when the server is not running", async () => {
      const logger = createMockLogger();
      serverManager = new ServerManager({ logger });

      await serverManager.stop();

      expect(logger.warn).toHaveBeenCalledWith("File server not running");
    });
  });

  it("should default to the working directory and port 8000", () => {
    serverManager = new ServerManager({ logger: createSilentLogger() });

    expect(serverManager.getStatus().rootDir).toBe(process.cwd());
    expect(serverManager.getConfig().port).toBe(8000);
    expect(serverManager.getConfig().hostname).toBe("0.0.0.0");
  });
});
