import { describe, expect, it } from "vitest";
import { buildAddSubmissionXml, buildReleaseSubmissionXml } from "../src/submission/submissionXml";
import { loadXml } from "../src/xml/xmlDocument";

describe("buildAddSubmissionXml", () => {
  it("holds a single ADD action", () => {
    const $ = loadXml(buildAddSubmissionXml());

    expect($("SUBMISSION > ACTIONS > ACTION").length).toBe(1);
    expect($("ACTION > ADD").length).toBe(1);
    expect($("HOLD").length).toBe(0);
  });

  it("adds a HOLD action with the release date", () => {
    const $ = loadXml(buildAddSubmissionXml({ holdUntil: "2026-10-19" }));

    expect($("SUBMISSION > ACTIONS > ACTION").length).toBe(2);
    expect($("ACTION > HOLD").attr("HoldUntilDate")).toBe("2026-10-19");
  });
});

describe("buildReleaseSubmissionXml", () => {
  it("modifies then releases the accession", () => {
    const $ = loadXml(buildReleaseSubmissionXml("ERS0000099"));
    const actions = $("SUBMISSION > ACTIONS > ACTION")
      .toArray()
      .map((node) => $(node).children().first().prop("tagName"));

    expect(actions).toEqual(["MODIFY", "RELEASE"]);
    expect($("RELEASE").attr("target")).toBe("ERS0000099");
  });

  it("is deterministic", () => {
    expect(buildReleaseSubmissionXml("ERS1")).toBe(buildReleaseSubmissionXml("ERS1"));
  });
});
