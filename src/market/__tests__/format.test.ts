import {
  classifySentiment,
  formatNumber,
  formatPercentage,
  formatUsdPrice,
  formatUtc,
  sentimentEmoji,
  truncate,
} from "@src/market/format";

describe("formatNumber", () => {
  it("renders absent values as N/A", () => {
    expect(formatNumber(undefined)).toBe("N/A");
  });

  it("abbreviates by magnitude", () => {
    expect(formatNumber(999)).toBe("$999.00");
    expect(formatNumber(1_500)).toBe("$1.50K");
    expect(formatNumber(1_000_000)).toBe("$1.00M");
    expect(formatNumber(2_500_000_000)).toBe("$2.50B");
    expect(formatNumber(3_000_000_000_000)).toBe("$3.00T");
  });

  it("uses the absolute value for the tier and keeps the sign", () => {
    expect(formatNumber(-1_500_000)).toBe("$-1.50M");
    expect(formatNumber(-42)).toBe("$-42.00");
  });

  it("honours a precision override", () => {
    expect(formatNumber(1_234_567, 1)).toBe("$1.2M");
  });
});

describe("formatPercentage", () => {
  it("marks positive values with an up arrow and a plus sign", () => {
    expect(formatPercentage(5.25)).toBe("📈 +5.25%");
  });

  it("marks negative values with a down arrow", () => {
    expect(formatPercentage(-3.1)).toBe("📉 -3.10%");
  });

  it("treats zero as non-positive", () => {
    expect(formatPercentage(0)).toBe("📉 0.00%");
  });

  it("renders absent values as N/A", () => {
    expect(formatPercentage(undefined)).toBe("N/A");
  });
});

describe("formatUsdPrice", () => {
  it("groups thousands", () => {
    expect(formatUsdPrice(64_250.4)).toBe("$64,250");
    expect(formatUsdPrice(64_250.456, 2)).toBe("$64,250.46");
  });

  it("renders absent values as N/A", () => {
    expect(formatUsdPrice(undefined, 2)).toBe("N/A");
  });
});

describe("classifySentiment", () => {
  it.each<[number, string]>([
    [100, "extreme-greed"],
    [75, "extreme-greed"],
    [74, "greed"],
    [55, "greed"],
    [54, "neutral"],
    [45, "neutral"],
    [44, "fear"],
    [25, "fear"],
    [24, "extreme-fear"],
    [0, "extreme-fear"],
  ])("classifies %i as %s", (value, bucket) => {
    expect(classifySentiment(value)).toBe(bucket);
  });

  it("maps buckets to emoji", () => {
    expect(sentimentEmoji("extreme-greed")).toBe("🤑");
    expect(sentimentEmoji("neutral")).toBe("😐");
    expect(sentimentEmoji("extreme-fear")).toBe("😱");
  });
});

describe("formatUtc", () => {
  const at = new Date("2026-10-18T09:05:00Z");

  it("renders date and time in UTC by default", () => {
    expect(formatUtc(at)).toBe("2026-10-18 09:05 UTC");
  });

  it("accepts a custom pattern", () => {
    expect(formatUtc(at, "HH:mm")).toBe("09:05 UTC");
  });
});

describe("truncate", () => {
  it("clips to the given width", () => {
    expect(truncate("Wrapped Bitcoin Token", 15)).toBe("Wrapped Bitcoin");
    expect(truncate("Aave", 15)).toBe("Aave");
  });
});
