import { describe, expect, it } from "vitest";

import { ValidationError } from "../../src/errors";
import { parseEnterpriseInput } from "../../src/schemas/enterprise_input";

describe("parseEnterpriseInput", () => {
  it("trims fields and keeps optional context", () => {
    expect(
      parseEnterpriseInput({
        name: "  Acme Co ",
        sector: "Manufacturing",
        period: "2024",
        region: " Northern Europe ",
        peers: [{ name: "Rival Ltd", focus: "safety culture" }],
      }),
    ).toEqual({
      name: "Acme Co",
      sector: "Manufacturing",
      period: "2024",
      region: "Northern Europe",
      peers: [{ name: "Rival Ltd", focus: "safety culture" }],
    });
  });

  it("lists every problem with its path", () => {
    const error = (() => {
      try {
        parseEnterpriseInput({ name: "", period: 2024, color: "green" });
      } catch (caught) {
        return caught;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toHaveProperty("issues", [
      "name: String must contain at least 1 character(s)",
      "sector: Required",
      "period: Expected string, received number",
      "Unrecognized key(s) in object: 'color'",
    ]);
  });

  it("rejects non-object input", () => {
    expect(() => parseEnterpriseInput("Acme")).toThrow("Enterprise input is invalid");
    expect(() => parseEnterpriseInput(null)).toThrow(ValidationError);
  });
});
