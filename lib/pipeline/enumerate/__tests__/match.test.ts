import { describe, it, expect } from "vitest";
import { matchResource, resolveReference } from "../match";

describe("resolveReference", () => {
  it("resolves relative to the referencing document", () => {
    expect(resolveReference("OEBPS/text/ch1.xhtml", "../images/a.png")).toBe(
      "OEBPS/images/a.png"
    );
  });

  it("drops fragments and query strings and decodes escapes", () => {
    expect(resolveReference("OEBPS/ch1.xhtml", "img/my%20pic.jpg?v=2#frag")).toBe(
      "OEBPS/img/my pic.jpg"
    );
  });

  it("never climbs above the archive root", () => {
    expect(resolveReference("ch1.xhtml", "../../x.png")).toBe("x.png");
  });
});

describe("matchResource", () => {
  const candidates = ["OEBPS/images/cover.jpg", "OEBPS/images/p1.png", "OEBPS/alt/p1.png"];

  it("matches by file name regardless of directory prefix", () => {
    expect(matchResource("OEBPS/Images/../images/p1.png", candidates, new Set())).toBe(
      "OEBPS/images/p1.png"
    );
    expect(matchResource("wrong/prefix/p1.png", candidates, new Set())).toBe(
      "OEBPS/images/p1.png"
    );
  });

  it("matches when the candidate is a suffix of the reference", () => {
    expect(matchResource("root/OEBPS/images/cover.jpg", candidates, new Set())).toBe(
      "OEBPS/images/cover.jpg"
    );
  });

  it("skips claimed resources and takes the next match", () => {
    const claimed = new Set(["OEBPS/images/p1.png"]);
    expect(matchResource("p1.png", candidates, claimed)).toBe("OEBPS/alt/p1.png");
  });

  it("returns null once every match is claimed", () => {
    const claimed = new Set(["OEBPS/images/p1.png", "OEBPS/alt/p1.png"]);
    expect(matchResource("p1.png", candidates, claimed)).toBeNull();
  });

  it("does not match partial file names", () => {
    expect(matchResource("1.png", candidates, new Set())).toBeNull();
  });
});
