import { describe, it, expect } from "vitest";
import { IdentityAssigner, pageStem, stagedName } from "../identity";

describe("stagedName", () => {
  it("pads page numbers to four digits", () => {
    expect(stagedName(1, "jpg")).toBe("page_0001.jpg");
    expect(stagedName(42, "png")).toBe("page_0042.png");
  });

  it("widens past 9999", () => {
    expect(pageStem(12345)).toBe("page_12345");
  });
});

describe("IdentityAssigner", () => {
  it("numbers pages densely from 1", () => {
    const ids = new IdentityAssigner();
    expect([ids.assign(false), ids.assign(false), ids.assign(false)].map((i) => i.pageNumber)).toEqual([
      1, 2, 3,
    ]);
    expect(ids.assigned).toBe(3);
  });

  it("marks a hinted first image as the cover", () => {
    const ids = new IdentityAssigner();
    expect(ids.assign(true)).toEqual({ pageNumber: 1, isCover: true });
    expect(ids.assign(false)).toEqual({ pageNumber: 2, isCover: false });
  });

  it("ignores a cover hint that arrives after page 1", () => {
    const ids = new IdentityAssigner();
    ids.assign(false);
    expect(ids.assign(true)).toEqual({ pageNumber: 2, isCover: false });
  });
});
