import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../errors/catalog.js";
import {
  createEnvCredentialSource,
  createStaticCredentialSource,
} from "./env.js";

describe("createEnvCredentialSource", () => {
  it("returns both keys when set", () => {
    const source = createEnvCredentialSource({
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });

    expect(source.resolve()).toEqual({
      accessKeyId: "test-access-key",
      secretAccessKey: "test-secret",
    });
  });

  it("includes the session token when present", () => {
    const source = createEnvCredentialSource({
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      AWS_SESSION_TOKEN: "test-session-token",
    });

    expect(source.resolve().sessionToken).toBe("test-session-token");
  });

  it("throws ConfigurationError naming the missing access key id", () => {
    const source = createEnvCredentialSource({
      AWS_SECRET_ACCESS_KEY: "test-secret",
    });

    expect(() => source.resolve()).toThrow(ConfigurationError);
    expect(() => source.resolve()).toThrow(
      "Missing AWS_ACCESS_KEY_ID environment variable",
    );
  });

  it("treats an empty secret as missing", () => {
    const source = createEnvCredentialSource({
      AWS_ACCESS_KEY_ID: "test-access-key",
      AWS_SECRET_ACCESS_KEY: "",
    });

    expect(() => source.resolve()).toThrow(
      "Missing AWS_SECRET_ACCESS_KEY environment variable",
    );
  });

  it("reads the environment at call time, not at creation", () => {
    const env: NodeJS.ProcessEnv = {};
    const source = createEnvCredentialSource(env);

    expect(() => source.resolve()).toThrow(ConfigurationError);

    env.AWS_ACCESS_KEY_ID = "test-access-key";
    env.AWS_SECRET_ACCESS_KEY = "test-secret";

    expect(source.resolve().accessKeyId).toBe("test-access-key");
  });
});

describe("createStaticCredentialSource", () => {
  it("returns a copy of the given credentials", () => {
    const credentials = {
      accessKeyId: "test-access-key",
      secretAccessKey: "test-secret",
    };
    const resolved = createStaticCredentialSource(credentials).resolve();

    expect(resolved).toEqual(credentials);
    expect(resolved).not.toBe(credentials);
  });

  it("rejects empty values", () => {
    expect(() =>
      createStaticCredentialSource({
        accessKeyId: "",
        secretAccessKey: "test-secret",
      }).resolve(),
    ).toThrow(ConfigurationError);
  });
});
