import { describe, expect, it } from "vitest";
import { z } from "zod";
import { decodeField, decodeString, decodeValue } from "./decode.js";
import { photoListSchema, photoSchema } from "./photo.js";
import { contactSchema, decodePartial } from "./contact.js";
import { encodePhoto, encodeTodos } from "./encode.js";
import { todoListSchema } from "./todo.js";

describe("photoSchema", () => {
  it("fills in a missing title with (untitled)", () => {
    const result = decodeString(photoSchema, '{"url": "fruits.com", "size": 5}');

    expect(result).toEqual({
      ok: true,
      data: { url: "fruits.com", size: 5, title: "(untitled)" },
    });
  });

  it("keeps a title that is present", () => {
    const result = decodeValue(photoSchema, { url: "a.jpeg", size: 10, title: "Sunset" });

    expect(result).toEqual({ ok: true, data: { url: "a.jpeg", size: 10, title: "Sunset" } });
  });

  it("reports the path of a wrong-typed field", () => {
    const result = decodeValue(photoSchema, { url: "a.jpeg", size: "big" });

    expect(result).toEqual({ ok: false, error: "size: Expected number, received string" });
  });

  it("accepts any numeric size, fractional included", () => {
    const result = decodeValue(photoListSchema, [{ url: "a.jpeg", size: 2.5 }]);

    expect(result).toEqual({ ok: true, data: [{ url: "a.jpeg", size: 2.5, title: "(untitled)" }] });
  });

  it("reports the index of a bad entry in a list", () => {
    const result = decodeValue(photoListSchema, [{ url: "a.jpeg", size: 1 }, { size: 2 }]);

    expect(result).toEqual({ ok: false, error: "1.url: Required" });
  });
});

describe("decodeString", () => {
  it("turns a JSON syntax error into an error result", () => {
    const result = decodeString(photoSchema, "{not json");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.startsWith("Invalid JSON: ")).toBe(true);
    }
  });

  it("labels a wrong top-level value as (root)", () => {
    expect(decodeString(photoListSchema, "42")).toEqual({
      ok: false,
      error: "(root): Expected array, received number",
    });
  });
});

describe("contactSchema", () => {
  it("accepts null for a nullable field", () => {
    expect(decodeValue(contactSchema, { name: "Ada", email: null })).toEqual({
      ok: true,
      data: { name: "Ada", email: null },
    });
  });

  it("rejects a missing nullable field", () => {
    expect(decodeValue(contactSchema, { name: "Ada" })).toEqual({
      ok: false,
      error: "email: Required",
    });
  });

  it("accepts a missing optional field and keeps a present one", () => {
    expect(
      decodeValue(contactSchema, { name: "Ada", email: "ada@example.com", nickname: "A" })
    ).toEqual({
      ok: true,
      data: { name: "Ada", email: "ada@example.com", nickname: "A" },
    });
  });
});

describe("decodePartial", () => {
  it("splits modelled fields from the rest", () => {
    const result = decodePartial(contactSchema, {
      name: "Ada",
      email: null,
      team: "blue",
      score: 3,
    });

    expect(result).toEqual({
      ok: true,
      data: {
        known: { name: "Ada", email: null },
        rest: { team: "blue", score: 3 },
      },
    });
  });

  it("fails when a modelled field is wrong", () => {
    expect(decodePartial(contactSchema, { name: "", email: null })).toEqual({
      ok: false,
      error: "name: String must contain at least 1 character(s)",
    });
  });
});

describe("decodeField", () => {
  it("extracts one field and ignores the others", () => {
    expect(decodeField({ url: "a.jpeg", size: "big" }, "url", z.string())).toEqual({
      ok: true,
      data: "a.jpeg",
    });
  });

  it("prefixes errors with the field name", () => {
    expect(decodeField({ size: "big" }, "size", z.number())).toEqual({
      ok: false,
      error: "size: Expected number, received string",
    });
  });

  it("reports a missing field", () => {
    expect(decodeField({}, "size", z.number())).toEqual({ ok: false, error: "size: Required" });
  });

  it("rejects non-objects", () => {
    expect(decodeField([1, 2], "size", z.number())).toEqual({
      ok: false,
      error: "(root): Expected object",
    });
  });
});

describe("encoders", () => {
  it("omits the placeholder title when encoding a photo", () => {
    expect(encodePhoto({ url: "a.jpeg", size: 3, title: "(untitled)" })).toEqual({
      url: "a.jpeg",
      size: 3,
    });
  });

  it("writes todos that decode back to the same list", () => {
    const todos = [{ id: 1, title: "Read chapter 4", completed: true }];
    const encoded = JSON.stringify(encodeTodos(todos));

    expect(encoded).toBe('[{"id":1,"title":"Read chapter 4","completed":true}]');
    expect(decodeString(todoListSchema, encoded)).toEqual({ ok: true, data: todos });
  });
});
