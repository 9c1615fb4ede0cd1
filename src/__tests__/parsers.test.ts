import { describe, it, expect } from "vitest";
import { MissingRequiredFieldError } from "../errors";
import {
  FEATURES,
  NO_LOCATION,
  NO_TITLE,
  extractCountryCode,
  normalizeProfile,
  normalizeRecord,
  normalizeStats,
  pathValue,
  toRow,
} from "../parsers";

const US = "https://api.chess.com/pub/country/US";

describe("parsers", () => {
  it("defaults every stats column to 0 for an empty bundle", () => {
    expect(Object.values(normalizeStats({}))).toEqual(Array(14).fill("0"));
  });

  it("fills location and title defaults when the profile only has country", () => {
    expect(normalizeProfile({ country: US })).toEqual({
      country: "US",
      location: "No Location Data Available",
      title: "None",
    });
  });

  it("strips the country prefix and leaves a bare code alone", () => {
    expect(extractCountryCode(US)).toBe("US");
    expect(extractCountryCode("US")).toBe("US");
    expect(extractCountryCode(extractCountryCode(US))).toBe("US");
    expect(extractCountryCode(".../pub/country/NO")).toBe("NO");
  });

  it("flattens a blitz-only player in column order", () => {
    const stats = {
      chess_blitz: {
        best: { rating: 2400 },
        record: { win: 10, loss: 2, draw: 1 },
      },
    };
    const profile = { country: ".../pub/country/NO" };
    expect(toRow(normalizeRecord(stats, profile))).toEqual([
      "0", "0", "0", "0",
      "2400", "10", "2", "1",
      "0", "0", "0", "0",
      "0", "0",
      "NO", NO_LOCATION, NO_TITLE,
    ]);
  });

  it("looks up rating and record independently", () => {
    const noRecord = normalizeStats({ chess_rapid: { best: { rating: 1850 } } });
    expect(noRecord.rapid_rating).toBe("1850");
    expect(noRecord.rapid_wins).toBe("0");

    const noBest = normalizeStats({
      chess_bullet: { record: { win: 7, loss: 3 } },
    });
    expect(noBest.bullet_rating).toBe("0");
    expect(noBest.bullet_wins).toBe("7");
    expect(noBest.bullet_losses).toBe("3");
    expect(noBest.bullet_draws).toBe("0");
  });

  it("reads tactics and puzzle rush bests", () => {
    const s = normalizeStats({
      tactics: { highest: { rating: 3105, date: 1600000000 } },
      puzzle_rush: { best: { total_attempts: 40, score: 37 } },
    });
    expect(s.tactics_rating).toBe("3105");
    expect(s.puzzle_rush_rating).toBe("37");
  });

  it("treats null and non-object intermediates as missing", () => {
    const s = normalizeStats({
      chess_rapid: null,
      chess_blitz: { best: "n/a", record: [1, 2, 3] },
      tactics: { highest: { rating: null } },
    });
    expect(s.rapid_rating).toBe("0");
    expect(s.blitz_rating).toBe("0");
    expect(s.blitz_wins).toBe("0");
    expect(s.tactics_rating).toBe("0");
  });

  it("keeps profile text fields as given", () => {
    expect(
      normalizeProfile({ country: US, location: "Oslo, Norway", title: "GM" }),
    ).toEqual({ country: "US", location: "Oslo, Norway", title: "GM" });
    expect(normalizeProfile({ country: US, location: "" }).location).toBe("");
    expect(normalizeProfile({ country: US, title: null }).title).toBe("None");
  });

  it("throws MissingRequiredFieldError without a country", () => {
    expect(() => normalizeProfile({ location: "Oslo" })).toThrow(
      MissingRequiredFieldError,
    );
    expect(() => normalizeRecord({}, { country: 47 })).toThrow(
      "Required field missing: country",
    );
  });

  it("emits every feature as a string in fixed order", () => {
    const record = normalizeRecord(
      { puzzle_rush: { best: { score: 12 } }, chess_rapid: { record: { draw: 4 } } },
      { title: "IM", country: US },
    );
    expect(Object.keys(record)).toEqual([...FEATURES]);
    const row = toRow(record);
    expect(row).toHaveLength(17);
    expect(row.every((v) => typeof v === "string")).toBe(true);
    expect(row[3]).toBe("4");
    expect(row[13]).toBe("12");
    expect(row[16]).toBe("IM");
  });

  it("pathValue stops at the first non-object step", () => {
    expect(pathValue({ a: { b: { c: 1 } } }, ["a", "b", "c"])).toBe(1);
    expect(pathValue({ a: 5 }, ["a", "b"])).toBeUndefined();
    expect(pathValue(undefined, ["a"])).toBeUndefined();
  });
});
