import { describe, it, expect } from "vitest";
import { calculateHashFromContent, hashedFileName } from "./hash.ts";

const SHA256_EMPTY = "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";
const SHA256_ABC = "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

describe("calculateHashFromContent", () => {
  it("hashes bytes to lowercase hex", () => {
    expect(calculateHashFromContent(new TextEncoder().encode("abc"))).toBe(SHA256_ABC);
  });

  it("hashes empty content", () => {
    expect(calculateHashFromContent(new Uint8Array())).toBe(SHA256_EMPTY);
  });

  it("returns different hashes for different content", () => {
    const encoder = new TextEncoder();

    expect(calculateHashFromContent(encoder.encode("content1"))).not.toBe(
      calculateHashFromContent(encoder.encode("content2")),
    );
  });
});

describe("hashedFileName", () => {
  it("inserts the first 12 hex characters before the extension", () => {
    expect(hashedFileName("css/app.css", SHA256_ABC)).toBe("css/app.ba7816bf8f01.css");
  });

  it("handles files at the root", () => {
    expect(hashedFileName("robots.txt", SHA256_ABC)).toBe("robots.ba7816bf8f01.txt");
  });

  it("keeps earlier dots in the stem", () => {
    expect(hashedFileName("js/vendor.min.js", SHA256_EMPTY)).toBe("js/vendor.min.e3b0c44298fc.js");
  });

  it("appends the hash to names without an extension", () => {
    expect(hashedFileName("fonts/LICENSE", SHA256_EMPTY)).toBe("fonts/LICENSE.e3b0c44298fc");
  });
});
