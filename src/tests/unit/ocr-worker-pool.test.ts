import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";
import { resolveLanguageData } from "../../documents/ocr/language-data";
import { resolveWorkerCount } from "../../documents/ocr/ocr-worker-pool";

describe("resolveWorkerCount", () => {
  it("keeps at least one worker", () => {
    assert.equal(resolveWorkerCount(0), 1);
    assert.equal(resolveWorkerCount(1), 1);
  });

  it("caps workers at the available cores", () => {
    assert.equal(resolveWorkerCount(Number.MAX_SAFE_INTEGER), os.availableParallelism());
  });
});

describe("resolveLanguageData", () => {
  it("uses an explicit traineddata directory for any language set", () => {
    assert.deepEqual(resolveLanguageData(["eng", "deu"], "/srv/tessdata"), { langPath: "/srv/tessdata", gzip: true });
  });

  it("points at the installed data package for a single language", () => {
    const requests: string[] = [];
    const data = resolveLanguageData(["eng"], null, (request) => {
      requests.push(request);
      return "/deps/node_modules/@tesseract.js-data/eng/package.json";
    });

    assert.deepEqual(requests, ["@tesseract.js-data/eng/package.json"]);
    assert.deepEqual(data, { langPath: "/deps/node_modules/@tesseract.js-data/eng/4.0.0_best_int", gzip: true });
  });

  it("finds the bundled english data", () => {
    const data = resolveLanguageData(["eng"]);

    assert.ok(data.langPath.endsWith(path.join("@tesseract.js-data", "eng", "4.0.0_best_int")));
  });

  it("names the package to add when a language has no data", () => {
    assert.throws(
      () =>
        resolveLanguageData(["fra"], null, () => {
          throw new Error("Cannot find module");
        }),
      { message: 'No recognition data installed for "fra"; add the @tesseract.js-data/fra package' },
    );
  });

  it("asks for a directory when several languages are configured", () => {
    assert.throws(() => resolveLanguageData(["eng", "deu"]), {
      message: "Recognition languages eng+deu need OCR_LANG_PATH pointing at their traineddata",
    });
  });
});
