import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DISEASE_CLASSES, DiseaseCatalog, determineSeverityLevel, isDiseaseName } from "../disease";

describe("determineSeverityLevel", () => {
  it("maps confidence bands to severity labels", () => {
    expect(determineSeverityLevel(0.95)).toBe("Very High");
    expect(determineSeverityLevel(0.9)).toBe("Very High");
    expect(determineSeverityLevel(0.89)).toBe("High");
    expect(determineSeverityLevel(0.8)).toBe("High");
    expect(determineSeverityLevel(0.7)).toBe("Medium");
    expect(determineSeverityLevel(0.6)).toBe("Low");
    expect(determineSeverityLevel(0.59)).toBe("Very Low");
  });
});

describe("DiseaseCatalog", () => {
  const catalog = new DiseaseCatalog();

  it("has dedicated guidance for every class", () => {
    for (const name of DISEASE_CLASSES) {
      expect(catalog.guidanceFor(name)).not.toEqual(catalog.guidanceFor("Blight"));
    }
    expect(catalog.guidanceFor("Phoma").description).toMatch(/^Phoma leaf spot/);
  });

  it("falls back to the unknown entry for unrecognised labels", () => {
    expect(catalog.guidanceFor("Blight")).toEqual({
      description: "The disease could not be identified.",
      treatment: "Contact an agronomist for specific advice.",
    });
  });

  it("has dedicated guidance for non-leaf images", () => {
    expect(catalog.guidanceFor("Not Coffee Leaf").treatment).toBe("No treatment suggested for a non-leaf image.");
  });

  it("rejects a malformed catalogue", () => {
    expect(() => new DiseaseCatalog({ classes: [{ name: "Rust" }] })).toThrow(ZodError);
  });
});

describe("isDiseaseName", () => {
  it("accepts only the five model classes", () => {
    expect(isDiseaseName("Phoma")).toBe(true);
    expect(isDiseaseName("Not Coffee Leaf")).toBe(false);
    expect(isDiseaseName("rust")).toBe(false);
  });
});
