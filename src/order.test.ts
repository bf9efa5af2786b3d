import { describe, it, expect } from "vitest";
import { orderCategories } from "./order.js";

describe("orderCategories", () => {
  it("puts canonical labels first and sorts the rest", () => {
    expect(orderCategories(["zeta", "Money", "alpha", "Other"], ["Other", "Ideological", "Money"])).toEqual([
      "Other",
      "Money",
      "alpha",
      "zeta",
    ]);
  });

  it("sorts by code unit, upper case before lower case", () => {
    expect(orderCategories(["beta", "Beta", "alpha"], [])).toEqual(["Beta", "alpha", "beta"]);
  });

  it("returns exactly the observed labels regardless of input order", () => {
    const canonical = ["c", "a"];
    const a = orderCategories(["a", "d", "c", "b", "a"], canonical);
    const b = orderCategories(new Set(["b", "c", "d", "a"]), canonical);
    expect(a).toEqual(["c", "a", "b", "d"]);
    expect(b).toEqual(a);
  });

  it("ignores canonical labels that were not observed", () => {
    expect(orderCategories(["x"], ["a", "b"])).toEqual(["x"]);
    expect(orderCategories([], ["a", "b"])).toEqual([]);
  });
});
