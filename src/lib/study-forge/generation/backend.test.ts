import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors";
import { OpenAIChatBackend } from "./backend";

describe("OpenAIChatBackend", () => {
    it("requires a credential", () => {
        expect(() => new OpenAIChatBackend({ model: "gpt-4o-mini", temperature: 0.7 })).toThrow(ConfigError);
    });

    it("builds a client from explicit configuration", () => {
        const backend = new OpenAIChatBackend({
            apiKey: "test-secret",
            model: "gpt-4o-mini",
            baseUrl: "http://localhost:9999/v1",
            temperature: 0.2,
        });
        expect(backend.name).toBe("OpenAIChatBackend");
    });
});
