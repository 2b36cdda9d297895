import { FetchError, FetchErrorCode } from "@errors/FetchError";

describe("FetchError", () => {
  it("should prefix the message with the provider name", () => {
    const error = new FetchError("weather", "boom");

    expect(error.message).toBe("[weather] boom");
    expect(error.provider).toBe("weather");
    expect(error.code).toBe(FetchErrorCode.UNKNOWN);
    expect(error.recoverable).toBe(true);
    expect(error.context).toEqual({ provider: "weather" });
  });

  it("should create network errors", () => {
    const error = FetchError.network("weather", new Error("ECONNREFUSED"));

    expect(error.code).toBe(FetchErrorCode.NETWORK);
    expect(error.message).toBe("[weather] Network error: ECONNREFUSED");
    expect(error.context?.originalError).toBe("ECONNREFUSED");
  });

  it("should classify 401 and 403 as non-recoverable auth errors", () => {
    const unauthorized = FetchError.httpStatus("api", 401, "http://x");
    const forbidden = FetchError.httpStatus("api", 403, "http://x");

    expect(unauthorized.code).toBe(FetchErrorCode.AUTH);
    expect(forbidden.code).toBe(FetchErrorCode.AUTH);
    expect(unauthorized.recoverable).toBe(false);
  });

  it("should mark server errors recoverable and client errors not", () => {
    expect(FetchError.httpStatus("api", 503, "http://x").recoverable).toBe(
      true,
    );
    expect(FetchError.httpStatus("api", 429, "http://x").recoverable).toBe(
      true,
    );
    expect(FetchError.httpStatus("api", 404, "http://x").recoverable).toBe(
      false,
    );
    expect(FetchError.httpStatus("api", 404, "http://x").code).toBe(
      FetchErrorCode.HTTP_STATUS,
    );
  });

  it("should create timeout errors", () => {
    const error = FetchError.timeout("slow", 30000);

    expect(error.code).toBe(FetchErrorCode.TIMEOUT);
    expect(error.message).toBe("[slow] Fetch timed out after 30000ms");
    expect(error.context?.timeoutMs).toBe(30000);
  });

  it("should create parse and thrown errors", () => {
    expect(FetchError.parse("p", "bad token").code).toBe(FetchErrorCode.PARSE);
    expect(FetchError.fromThrown("p", new Error("kaput")).message).toBe(
      "[p] Fetch threw: kaput",
    );
  });
});
