import { describe, expect, test } from "vitest";
import { formatCsv, formatFixed } from "../src/csv-writer";

describe("formatFixed", () => {
  test("rounds to the requested digits", () => {
    expect(formatFixed(400, 3)).toBe("400.000");
    expect(formatFixed(Math.fround(0.1), 6)).toBe("0.100000");
    expect(formatFixed(-2.5, 6)).toBe("-2.500000");
  });

  test("rounds exact ties to the even digit", () => {
    expect(formatFixed(400.0625, 3)).toBe("400.062");
    expect(formatFixed(400.1875, 3)).toBe("400.188");
    expect(formatFixed(Math.fround(1.0078125), 6)).toBe("1.007812");
    expect(formatFixed(-0.0078125, 6)).toBe("-0.007812");
    expect(formatFixed(2.5, 0)).toBe("2");
  });

  test("rounds the exact binary value rather than its shortest form", () => {
    // 0.0005 is stored slightly above the halfway point
    expect(formatFixed(0.0005, 3)).toBe("0.001");
    // 1.0005 is stored slightly below it
    expect(formatFixed(1.0005, 3)).toBe("1.000");
  });

  test("keeps the sign of a negative value that rounds to zero", () => {
    expect(formatFixed(-0.0001, 3)).toBe("-0.000");
  });

  test("prints non-finite values as inf and nan", () => {
    expect(formatFixed(Infinity, 6)).toBe("inf");
    expect(formatFixed(-Infinity, 6)).toBe("-inf");
    expect(formatFixed(Number.NaN, 6)).toBe("nan");
  });

  test("keeps the sign of negative zero", () => {
    expect(formatFixed(-0, 3)).toBe("-0.000");
  });

  test("stays positional for very large magnitudes", () => {
    expect(formatFixed(1e21, 3)).toBe("1000000000000000000000.000");
    expect(formatFixed(-3.4028234663852886e38, 6)).toBe(
      "-340282346638528859811704183484516925440.000000",
    );
  });
});

describe("formatCsv", () => {
  test("writes the header and one line per row", () => {
    const csv = formatCsv([
      { wavelength: 400, value: 1 },
      { wavelength: 550.5, value: 0.25 },
    ]);

    expect(csv).toBe(
      "Wavelength,Absorbance\n400.000,1.000000\n550.500,0.250000\n",
    );
  });

  test("writes only the header for no rows", () => {
    expect(formatCsv([])).toBe("Wavelength,Absorbance\n");
  });
});
