// pattern: Functional Core

import { describe, it, expect } from "vitest";
import { stripMarkup } from "./markup.ts";

describe("stripMarkup", () => {
  it("removes highlighting tags around matched substrings", () => {
    expect(stripMarkup("<em>Depresión</em> de episodio único")).toBe("Depresión de episodio único");
  });

  it("removes tags that carry attributes", () => {
    expect(stripMarkup("Trastorno de <em class='found'>ansiedad</em> generalizada")).toBe(
      "Trastorno de ansiedad generalizada",
    );
  });

  it("decodes HTML entities", () => {
    expect(stripMarkup("Lesiones &amp; traumatismos")).toBe("Lesiones & traumatismos");
  });

  it("collapses whitespace and trims", () => {
    expect(stripMarkup("  Diabetes   mellitus\n tipo 2 ")).toBe("Diabetes mellitus tipo 2");
  });

  it("leaves plain text untouched", () => {
    expect(stripMarkup("Esquizofrenia")).toBe("Esquizofrenia");
  });
});
