import { describe, expect, it } from "vitest";
import {
  MODEL_REGISTRY,
  DEFAULT_CONTEXT_WINDOW,
  DEFAULT_PRICING,
  resolveModelFamily,
  lookupModel,
  lookupPricing,
  contextWindowFor,
} from "../registry";

describe("resolveModelFamily", () => {
  it("returns an exact family unchanged", () => {
    expect(resolveModelFamily("claude-opus-4")).toBe("claude-opus-4");
  });

  it("resolves versioned ids to their family", () => {
    expect(resolveModelFamily("claude-opus-4-6")).toBe("claude-opus-4");
    expect(resolveModelFamily("claude-sonnet-4-5-20250929")).toBe("claude-sonnet-4");
    expect(resolveModelFamily("claude-haiku-4-5-20251001")).toBe("claude-haiku-4");
  });

  it("resolves the claude-{version}-{family} naming convention", () => {
    expect(resolveModelFamily("claude-3-5-sonnet-20241022")).toBe("claude-3-5-sonnet");
    expect(resolveModelFamily("claude-3-5-haiku-20241022")).toBe("claude-3-5-haiku");
    expect(resolveModelFamily("claude-3-haiku-20240307")).toBe("claude-3-haiku");
    expect(resolveModelFamily("claude-3-opus-20240229")).toBe("claude-3-opus");
  });

  it("returns unknown ids unchanged", () => {
    expect(resolveModelFamily("some-unknown-model")).toBe("some-unknown-model");
    expect(resolveModelFamily("gpt-4o")).toBe("gpt-4o");
  });

  it("handles the empty string", () => {
    expect(resolveModelFamily("")).toBe("");
  });

  it("resolves every registry family to itself", () => {
    for (const family of Object.keys(MODEL_REGISTRY)) {
      expect(resolveModelFamily(`${family}-20250101`)).toBe(family);
    }
  });
});

describe("lookupModel / lookupPricing / contextWindowFor", () => {
  it("returns registry data for known families", () => {
    expect(lookupModel("claude-sonnet-4-5-20250929")).toEqual(MODEL_REGISTRY["claude-sonnet-4"]);
    expect(lookupPricing("claude-opus-4-1").inputPerMTok).toBe(15);
    expect(contextWindowFor("claude-haiku-4-5")).toBe(200_000);
  });

  it("falls back to defaults for unknown models", () => {
    expect(lookupModel("gpt-4o")).toBeNull();
    expect(lookupPricing("gpt-4o")).toEqual(DEFAULT_PRICING);
    expect(contextWindowFor("gpt-4o")).toBe(DEFAULT_CONTEXT_WINDOW);
  });

  it("default pricing is never zero", () => {
    expect(DEFAULT_PRICING.inputPerMTok).toBeGreaterThan(0);
    expect(DEFAULT_PRICING.outputPerMTok).toBeGreaterThan(0);
  });
});
