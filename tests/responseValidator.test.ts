import { describe, expect, it } from "vitest";
import { isValidCatalogResponse } from "../src/probe/responseValidator";

describe("catalog response validator", () => {
  it("accepts a success code with a canonical list item", () => {
    expect(isValidCatalogResponse({ code: 1, list: [{ vod_id: 1, vod_name: "x" }] })).toBe(true);
    expect(isValidCatalogResponse({ code: 200, list: [{ vod_id: 1, vod_name: "x" }] })).toBe(true);
  });

  it("rejects a non-success code", () => {
    expect(isValidCatalogResponse({ code: 0 })).toBe(false);
    expect(isValidCatalogResponse({ code: "1", list: [] })).toBe(false);
  });

  it("accepts aliased item fields", () => {
    expect(isValidCatalogResponse({ list: [{ id: 1, title: "x" }] })).toBe(true);
    expect(isValidCatalogResponse({ list: [{ video_id: 1, name: "x" }] })).toBe(true);
  });

  it("rejects list items missing an identifying field", () => {
    expect(isValidCatalogResponse({ list: [{ foo: 1 }] })).toBe(false);
    expect(isValidCatalogResponse({ list: [{ vod_id: 1 }] })).toBe(false);
    expect(isValidCatalogResponse({ list: ["x"] })).toBe(false);
  });

  it("accepts an empty list and rejects a non-array list", () => {
    expect(isValidCatalogResponse({ list: [] })).toBe(true);
    expect(isValidCatalogResponse({ list: { vod_id: 1 } })).toBe(false);
  });

  it("only inspects the first list item", () => {
    expect(isValidCatalogResponse({ list: [{ id: 1, name: "x" }, { foo: 1 }] })).toBe(true);
  });

  it("accepts object or array data and rejects scalar data", () => {
    expect(isValidCatalogResponse({ data: {} })).toBe(true);
    expect(isValidCatalogResponse({ data: [] })).toBe(true);
    expect(isValidCatalogResponse({ data: "x" })).toBe(false);
  });

  it("checks list before data", () => {
    expect(isValidCatalogResponse({ list: "nope", data: [] })).toBe(false);
  });

  it("falls back to non-emptiness", () => {
    expect(isValidCatalogResponse({})).toBe(false);
    expect(isValidCatalogResponse({ a: 1 })).toBe(true);
  });

  it("rejects non-object payloads", () => {
    expect(isValidCatalogResponse([])).toBe(false);
    expect(isValidCatalogResponse(null)).toBe(false);
    expect(isValidCatalogResponse("ok")).toBe(false);
    expect(isValidCatalogResponse(1)).toBe(false);
  });
});
