import { describe, it } from "mocha";
import { expect } from "chai";

import {
  collectUrls,
  extractPreferredUrl,
  firstScalarAt,
  isCarUrl,
  parseResponseDocument,
} from "../../src/acquisition/responseTree.js";
import { NoUrlError } from "../../src/errors.js";

describe("acquisition/responseTree", () => {
  describe("parseResponseDocument", () => {
    it("returns null for bodies that are not JSON", () => {
      expect(parseResponseDocument("job-123")).to.equal(null);
      expect(parseResponseDocument("<html>bad gateway</html>")).to.equal(null);
      expect(parseResponseDocument("")).to.equal(null);
    });

    it("parses JSON scalars, arrays and objects", () => {
      expect(parseResponseDocument('"job-123"')).to.equal("job-123");
      expect(parseResponseDocument("[1,true,null]")).to.deep.equal([1, true, null]);
      expect(parseResponseDocument('{"data":{"id":7}}')).to.deep.equal({ data: { id: 7 } });
    });
  });

  describe("firstScalarAt", () => {
    it("walks objects and array indices", () => {
      const body = '{"data":{"items":["a","b"]}}';
      expect(firstScalarAt(body, ["/data/items/1"])).to.equal("b");
      expect(firstScalarAt(body, ["/data/items/9", "/data/missing/deeper"])).to.equal(null);
    });

    it("decodes ~1 and ~0 escapes", () => {
      const body = '{"data":{"a/b":"slash","m~n":"tilde"}}';
      expect(firstScalarAt(body, ["/data/a~1b"])).to.equal("slash");
      expect(firstScalarAt(body, ["/data/m~0n"])).to.equal("tilde");
    });

    it("skips empty, null and structured values", () => {
      const body = '{"a":"","b":null,"c":{"x":1},"d":42,"e":"late"}';
      expect(firstScalarAt(body, ["/a", "/b", "/c", "/d", "/e"])).to.equal("42");
      expect(firstScalarAt(body, ["/missing"])).to.equal(null);
    });

    it("returns numbers as written so large identifiers keep every digit", () => {
      expect(firstScalarAt('{"jobId":12345678901234567890}', ["/jobId"])).to.equal("12345678901234567890");
      expect(firstScalarAt('{"jobId":9007199254740993}', ["/jobId"])).to.equal("9007199254740993");
    });

    it("takes the last occurrence of a duplicated key", () => {
      expect(firstScalarAt('{"id":"first","id":"second"}', ["/id"])).to.equal("second");
    });

    it("returns null for bodies that are not strict JSON", () => {
      expect(firstScalarAt("job-123", ["/id"])).to.equal(null);
      expect(firstScalarAt('{"id":"x",}', ["/id"])).to.equal(null);
      expect(firstScalarAt('{"id":"x"} // note', ["/id"])).to.equal(null);
    });
  });

  describe("collectUrls", () => {
    it("visits the tree depth-first in document order", () => {
      const body = JSON.stringify({
        first: "https://a.example.test/1",
        nested: { list: ["ftp://ignored.example.test", "http://b.example.test/2"], more: "not a url" },
        last: "HTTPS://c.example.test/3",
      });
      expect(collectUrls(body)).to.deep.equal([
        "https://a.example.test/1",
        "http://b.example.test/2",
        "HTTPS://c.example.test/3",
      ]);
    });

    it("keeps text order when keys look like array indices", () => {
      const body = '{"primary":"https://a.example.test/first","10":"https://b.example.test/second"}';
      expect(collectUrls(body)).to.deep.equal(["https://a.example.test/first", "https://b.example.test/second"]);
    });

    it("ignores URLs that only appear as object keys", () => {
      expect(collectUrls('{"https://key.example.test/x.car":"plain"}')).to.deep.equal([]);
    });
  });

  describe("isCarUrl", () => {
    it("recognises .car file names followed by an end, query or separator", () => {
      expect(isCarUrl("https://x.example.test/bundle.car")).to.equal(true);
      expect(isCarUrl("https://x.example.test/bundle.CAR?sig=1")).to.equal(true);
      expect(isCarUrl("https://x.example.test/bundle.car&x=1")).to.equal(true);
      expect(isCarUrl("https://x.example.test/bundle.car/download")).to.equal(true);
      expect(isCarUrl("https://x.example.test/bundle.cart")).to.equal(false);
      expect(isCarUrl("https://x.example.test/bundle.car_old")).to.equal(false);
    });
  });

  describe("extractPreferredUrl", () => {
    it("prefers the earlier of two generic URLs when a later key is numeric", () => {
      const body = '{"primary":"https://a.example.test/first","10":"https://b.example.test/second"}';
      expect(extractPreferredUrl(body)).to.equal("https://a.example.test/first");
    });


    it("prefers the first .car URL over earlier generic URLs", () => {
      const body = JSON.stringify({
        status: "done",
        links: { page: "https://x.example.test/index.html", file: "https://x.example.test/data.car" },
        mirror: "https://y.example.test/data.car",
      });
      expect(extractPreferredUrl(body)).to.equal("https://x.example.test/data.car");
    });

    it("falls back to the first URL when none names a .car file", () => {
      const body = '{"url":"https://x.example.test/download?id=1","other":"https://z.example.test"}';
      expect(extractPreferredUrl(body)).to.equal("https://x.example.test/download?id=1");
    });

    it("throws NoUrlError when the response carries no URL", () => {
      expect(() => extractPreferredUrl('{"status":"done"}'))
        .to.throw(NoUrlError)
        .with.property("code", "E-NO-URL");
      expect(() => extractPreferredUrl("not json")).to.throw(NoUrlError);
    });
  });
});
