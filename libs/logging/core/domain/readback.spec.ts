import { ReadbackVerifier } from "./readback";

describe("ReadbackVerifier", () => {
  describe("compare", () => {
    it("should accept identical sequences", () => {
      expect(ReadbackVerifier.compare(["a", "b"], ["a", "b"])).toBeUndefined();
      expect(ReadbackVerifier.compare([], [])).toBeUndefined();
    });

    it("should report the first differing position", () => {
      expect(ReadbackVerifier.compare(["a", "b", "c"], ["a", "x", "y"])).toEqual(
        {
          expected: ["a", "b", "c"],
          observed: ["a", "x", "y"],
          index: 1,
        },
      );
    });

    it("should report a lost message at the end of the shorter sequence", () => {
      expect(ReadbackVerifier.compare(["a", "b"], ["a"])?.index).toBe(1);
    });

    it("should report a duplicated message", () => {
      expect(ReadbackVerifier.compare(["a"], ["a", "a"])?.index).toBe(1);
    });

    it("should report reordering", () => {
      expect(ReadbackVerifier.compare(["a", "b"], ["b", "a"])?.index).toBe(0);
    });
  });

  describe("describe", () => {
    it("should render both sequences", () => {
      const mismatch = ReadbackVerifier.compare(["Hello, World!"], []);

      expect(mismatch).toBeDefined();
      if (mismatch) {
        expect(ReadbackVerifier.describe(mismatch)).toBe(
          'expected: ["Hello, World!"]; but observed: []',
        );
      }
    });
  });
});
