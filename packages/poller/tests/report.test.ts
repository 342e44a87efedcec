import { describe, expect, it } from "vitest";
import { renderSummary } from "../src/report";
import { makeEvent } from "./helpers";

describe("renderSummary", () => {
  const batch = [
    makeEvent({ place: "5 km NE of Julian, CA" }),
    makeEvent({ place: "Kermadec Islands region" }),
  ];

  it("lists places matching the filter, then region matches", () => {
    expect(
      renderSummary({
        batch,
        regionMatches: ["match one", "match one", "match two"],
        regionLabel: "North America",
        placeFilter: "Julian",
      }),
    ).toEqual([
      "Nearby shaker(s):",
      "5 km NE of Julian, CA",
      "Filter for North America",
      "match one",
      "match one",
      "match two",
    ]);
  });

  it("omits the place listing without a filter", () => {
    expect(
      renderSummary({ batch, regionMatches: [], regionLabel: "North America", placeFilter: null }),
    ).toEqual(["Filter for North America"]);
  });

  it("handles a run that never fetched a batch", () => {
    expect(
      renderSummary({ batch: [], regionMatches: [], regionLabel: "North America", placeFilter: "Julian" }),
    ).toEqual(["Nearby shaker(s):", "Filter for North America"]);
  });
});
