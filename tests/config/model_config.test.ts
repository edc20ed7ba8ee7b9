import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  clampTemperature,
  DEFAULT_MODEL_CONFIG,
  listProviderNames,
  loadModelConfig,
  loadModelConfigOrDefault,
  loadProviderConfig,
  ModelConfigError,
  providerKindFor,
  readModelConfigFile,
  setCurrentProvider,
  setOllamaModel,
  temperatureRange,
} from "../../src/config/modelConfig";

const REPO_CONFIG = path.resolve(__dirname, "../../model_config.json");

function tmpConfig(contents: unknown): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "artefact-config-"));
  const file = path.join(dir, "model_config.json");
  fs.writeFileSync(file, typeof contents === "string" ? contents : JSON.stringify(contents), "utf8");
  return file;
}

const sample = {
  current_provider: "local",
  providers: {
    local: {
      provider: "ollama",
      model: "llama3.1",
      max_tokens: 2000,
      api_endpoint: "http://localhost:11434/api/chat",
    },
    cloud: {
      provider: "anthropic",
      model: "claude-test",
      max_tokens: 4000,
      temperature: 0.5,
      api_endpoint: "https://llm.example.test/v1/messages",
      api_key_env: "TEST_KEY",
      headers: { "anthropic-version": "2023-06-01" },
    },
  },
};

describe("providerKindFor", () => {
  test("normalizes labels to a closed set", () => {
    expect(providerKindFor("Anthropic")).toBe("anthropic");
    expect(providerKindFor(" ollama ")).toBe("ollama");
    expect(providerKindFor("perplexity")).toBe("openai-compatible");
    expect(providerKindFor(undefined)).toBe("openai-compatible");
  });
});

describe("loadModelConfig", () => {
  test("every provider in the shipped configuration loads", () => {
    const file = readModelConfigFile(REPO_CONFIG);
    const kinds = Object.keys(file.providers).map((name) => [name, loadProviderConfig(file, name).provider]);
    expect(kinds).toEqual([
      ["anthropic", "anthropic"],
      ["openai", "openai-compatible"],
      ["perplexity", "openai-compatible"],
      ["ollama", "ollama"],
    ]);
  });

  test("maps snake_case entries and applies defaults", () => {
    const file = tmpConfig(sample);
    expect(loadModelConfig(file)).toEqual({
      provider: "ollama",
      vendor: "ollama",
      model: "llama3.1",
      maxTokens: 2000,
      temperature: 0.7,
      topP: undefined,
      presencePenalty: undefined,
      apiEndpoint: "http://localhost:11434/api/chat",
      apiKeyEnv: undefined,
      headers: {},
    });
  });

  test("keeps the vendor label of an OpenAI-compatible provider", () => {
    const config = loadProviderConfig(readModelConfigFile(REPO_CONFIG), "perplexity");
    expect(config).toMatchObject({ provider: "openai-compatible", vendor: "perplexity", apiKeyEnv: "PERPLEXITY_API_KEY" });
  });

  test("uses the entry name when the provider label is absent", () => {
    const file = tmpConfig({
      providers: { anthropic: { ...sample.providers.cloud, provider: undefined } },
    });
    expect(loadModelConfig(file)).toMatchObject({ provider: "anthropic", vendor: "anthropic" });
  });

  test("rejects a keyed provider without api_key_env", () => {
    const file = tmpConfig({ current_provider: "cloud", providers: { cloud: { ...sample.providers.cloud, api_key_env: undefined } } });
    expect(() => loadModelConfig(file)).toThrow("Provider cloud is missing api_key_env");
  });

  test("reports unknown providers and malformed files as ModelConfigError", () => {
    expect(() => loadModelConfig(tmpConfig({ current_provider: "missing", providers: {} }))).toThrow(
      "Provider missing not found in configuration"
    );
    expect(() => loadModelConfig(tmpConfig("{ not json"))).toThrow(ModelConfigError);
    expect(() => loadModelConfig(tmpConfig({ providers: { anthropic: { model: "m" } } }))).toThrow(
      "Provider anthropic has an invalid configuration"
    );
    expect(() => loadModelConfig(path.join(os.tmpdir(), "no-such-dir", "model_config.json"))).toThrow(ModelConfigError);
  });
});

describe("loadModelConfigOrDefault", () => {
  test("falls back to the built-in Anthropic configuration", () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    expect(loadModelConfigOrDefault(tmpConfig("[]"))).toBe(DEFAULT_MODEL_CONFIG);
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});

describe("configuration updates", () => {
  test("setCurrentProvider switches the active provider", () => {
    const file = tmpConfig(sample);
    setCurrentProvider(file, "cloud");
    expect(loadModelConfig(file).provider).toBe("anthropic");
    expect(listProviderNames(file)).toEqual(["local", "cloud"]);
  });

  test("setCurrentProvider refuses an unknown name and leaves the file alone", () => {
    const file = tmpConfig(sample);
    const before = fs.readFileSync(file, "utf8");
    expect(() => setCurrentProvider(file, "nope")).toThrow("Provider nope not found in configuration");
    expect(fs.readFileSync(file, "utf8")).toBe(before);
  });

  test("setOllamaModel rewrites only the model of the named entry", () => {
    const file = tmpConfig(sample);
    setOllamaModel(file, "mistral:7b", "local");

    const written = JSON.parse(fs.readFileSync(file, "utf8"));
    expect(written.providers.local).toEqual({ ...sample.providers.local, model: "mistral:7b" });
    expect(written.providers.cloud).toEqual(sample.providers.cloud);
    expect(fs.readFileSync(file, "utf8")).toContain('\n    "current_provider": "local"');
  });

  test("setOllamaModel fails for a missing entry", () => {
    expect(() => setOllamaModel(tmpConfig(sample), "mistral")).toThrow("Provider ollama not found in configuration");
  });
});

describe("temperature ranges", () => {
  const file = readModelConfigFile(REPO_CONFIG);

  test("follow the vendor label", () => {
    expect(temperatureRange(loadProviderConfig(file, "anthropic"))).toEqual([0, 1]);
    expect(temperatureRange(loadProviderConfig(file, "perplexity"))).toEqual([0, 1.99]);
    expect(temperatureRange(loadProviderConfig(file, "openai"))).toEqual([0, 2]);
    expect(temperatureRange({ ...loadProviderConfig(file, "openai"), vendor: "groq" })).toEqual([0, 1]);
  });

  test("clampTemperature", () => {
    const anthropic = loadProviderConfig(file, "anthropic");
    expect(clampTemperature(anthropic, 1.5)).toBe(1);
    expect(clampTemperature(anthropic, -0.2)).toBe(0);
    expect(clampTemperature(loadProviderConfig(file, "ollama"), 1.5)).toBe(1.5);
  });
});
