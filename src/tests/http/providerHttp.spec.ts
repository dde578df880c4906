import axios, { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { WolframAdapter } from "../../data/wolfram";
import { CircuitOpenError, ProviderUnavailableError } from "../../errors";
import { AxiosProviderHttp, isOutage } from "../../utils";

function clientRecording(calls: string[]) {
  return axios.create({
    adapter: async (config) => {
      calls.push(config.url ?? "");
      if (config.url?.includes("down.local")) {
        throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
      }
      const status = Number(config.url?.match(/\/status\/(\d{3})/)?.[1] ?? 200);
      if (status !== 200) {
        const response = { data: "", status, statusText: "", headers: {}, config };
        throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, undefined, response);
      }
      const data = config.responseType === "text" ? "plain body" : { ok: true };
      return { data, status: 200, statusText: "OK", headers: {}, config };
    }
  });
}

describe("AxiosProviderHttp", () => {
  it("returns response bodies", async () => {
    const http = new AxiosProviderHttp(clientRecording([]));

    await expect(http.getJson("http://up.local/data", { timeoutMs: 100 })).resolves.toEqual({ ok: true });
    await expect(http.getText("http://up.local/text", { timeoutMs: 100 })).resolves.toBe("plain body");
  });

  it("wraps transport failures", async () => {
    const http = new AxiosProviderHttp(clientRecording([]));
    await expect(http.getJson("http://down.local/data", { timeoutMs: 100 })).rejects.toBeInstanceOf(ProviderUnavailableError);
  });

  it("opens the breaker for a host after repeated failures", async () => {
    const calls: string[] = [];
    const http = new AxiosProviderHttp(clientRecording(calls), { failureThreshold: 2, cooldownMs: 60_000 });

    await expect(http.getJson("http://down.local/a", { timeoutMs: 100 })).rejects.toThrow("ECONNREFUSED");
    await expect(http.getJson("http://down.local/b", { timeoutMs: 100 })).rejects.toThrow("ECONNREFUSED");
    await expect(http.getJson("http://down.local/c", { timeoutMs: 100 })).rejects.toBeInstanceOf(CircuitOpenError);
    expect(calls).toEqual(["http://down.local/a", "http://down.local/b"]);

    await expect(http.getJson("http://up.local/data", { timeoutMs: 100 })).resolves.toEqual({ ok: true });
  });

  it("keeps the breaker closed for replies that carry no answer", async () => {
    const calls: string[] = [];
    const http = new AxiosProviderHttp(clientRecording(calls), { failureThreshold: 2, cooldownMs: 60_000 });

    await expect(http.getText("http://answers.local/status/501", { timeoutMs: 100 })).rejects.toThrow("HTTP 501");
    await expect(http.getText("http://answers.local/status/501", { timeoutMs: 100 })).rejects.toThrow("HTTP 501");
    await expect(http.getText("http://answers.local/status/404", { timeoutMs: 100 })).rejects.toThrow("HTTP 404");
    await expect(http.getText("http://answers.local/ok", { timeoutMs: 100 })).resolves.toBe("plain body");
    expect(calls).toHaveLength(4);
  });

  it("counts server errors against the breaker", async () => {
    const calls: string[] = [];
    const http = new AxiosProviderHttp(clientRecording(calls), { failureThreshold: 2, cooldownMs: 60_000 });

    await expect(http.getJson("http://flaky.local/status/503", { timeoutMs: 100 })).rejects.toThrow("HTTP 503");
    await expect(http.getJson("http://flaky.local/status/500", { timeoutMs: 100 })).rejects.toThrow("HTTP 500");
    await expect(http.getJson("http://flaky.local/ok", { timeoutMs: 100 })).rejects.toBeInstanceOf(CircuitOpenError);
    expect(calls).toHaveLength(2);
  });

  it("reports the reply status on the error", async () => {
    const http = new AxiosProviderHttp(clientRecording([]));
    const failure = await http.getJson("http://answers.local/status/404", { timeoutMs: 100 }).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderUnavailableError);
    if (failure instanceof ProviderUnavailableError) {
      expect(failure.provider).toBe("answers.local");
      expect(failure.status).toBe(404);
    }
  });
});

describe("WolframAdapter over AxiosProviderHttp", () => {
  it("keeps answering after questions that have no short answer", async () => {
    let calls = 0;
    const client = axios.create({
      adapter: async (config) => {
        calls += 1;
        const input = String(config.params?.i ?? "");
        if (input.startsWith("gibberish")) {
          const response = { data: "No short answer available", status: 501, statusText: "", headers: {}, config };
          throw new AxiosError("Request failed with status code 501", "ERR_BAD_RESPONSE", config, undefined, response);
        }
        return { data: "The answer is forty two", status: 200, statusText: "OK", headers: {}, config };
      }
    });
    const adapter = new WolframAdapter(new AxiosProviderHttp(client), "test-app-id");

    await expect(adapter.fetch("gibberish one", 5)).resolves.toBeNull();
    await expect(adapter.fetch("gibberish two", 5)).resolves.toBeNull();
    await expect(adapter.fetch("what is 6 times 7", 5)).resolves.toBe("The answer is forty two");
    expect(calls).toBe(5);
  });
});

describe("isOutage", () => {
  it("separates outages from empty replies", () => {
    expect(isOutage(new ProviderUnavailableError("h", "HTTP 501", { status: 501 }))).toBe(false);
    expect(isOutage(new ProviderUnavailableError("h", "HTTP 404", { status: 404 }))).toBe(false);
    expect(isOutage(new ProviderUnavailableError("h", "HTTP 502", { status: 502 }))).toBe(true);
    expect(isOutage(new ProviderUnavailableError("h", "request timed out"))).toBe(true);
  });
});
