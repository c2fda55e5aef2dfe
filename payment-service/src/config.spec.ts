import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("fills in local defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      NODE_ENV: "development",
      PORT: 8080,
      SERVICE_NAME: "payment-service",
      PAYMENT_QUEUE: "payment_intents",
      LOG_LEVEL: "info",
    });
    expect(config.RABBITMQ_MANAGEMENT_URL).toBeUndefined();
    expect(config.LOKI_URL).toBeUndefined();
  });

  it("coerces the port", () => {
    expect(loadConfig({ PORT: "9090" }).PORT).toBe(9090);
  });

  it("treats an empty optional url as unset", () => {
    expect(loadConfig({ LOKI_URL: "" }).LOKI_URL).toBeUndefined();
  });

  it("lists the invalid variables", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(
      "Invalid environment variables: PORT: Expected number, received nan"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid environment variables: LOG_LEVEL: /);
  });
});
