import * as http from "http";
import * as https from "https";
import logger, { trafficLogger } from "./logger";

export type HttpMethod = "GET" | "PATCH" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

/** Minimal JSON-over-HTTP surface used by the REST API. */
export interface HttpClient {
  request(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * HttpClient on Node's http/https modules. Rejects on network failure and on
 * timeout; any HTTP status resolves so callers can tell 404 from unreachable.
 */
export class NodeHttpClient implements HttpClient {
  public request(request: HttpRequest): Promise<HttpResponse> {
    const url = new URL(request.url);
    const transport = url.protocol === "https:" ? https : http;
    const payload =
      request.body === undefined ? undefined : JSON.stringify(request.body);

    const headers: { [key: string]: string } = {
      Accept: "application/json",
      "User-Agent": "simnet-client",
    };
    if (payload !== undefined) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = String(Buffer.byteLength(payload));
    }

    return new Promise((resolve, reject) => {
      const req = transport.request(
        url,
        { method: request.method, headers },
        (res) => {
          let data = "";
          res.setEncoding("utf8");
          res.on("data", (chunk) => {
            data += chunk;
          });
          res.on("end", () => {
            const statusCode = res.statusCode ?? 0;
            trafficLogger.info(`${request.method} ${request.url}: ${statusCode}`);
            resolve({ statusCode, body: data });
          });
          res.on("error", reject);
        }
      );

      req.setTimeout(request.timeoutMs, () => {
        req.destroy(
          new Error(`${request.method} ${request.url} timed out after ${request.timeoutMs}ms`)
        );
      });
      req.on("error", (error) => {
        logger.debug(`${request.method} ${request.url} failed: ${error.message}`);
        reject(error);
      });

      if (payload !== undefined) {
        trafficLogger.info(`${request.method} ${request.url} ${payload}`);
        req.write(payload);
      }
      req.end();
    });
  }
}
