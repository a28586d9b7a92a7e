import { describe, it, expect } from "vitest";
import { hostnameOf, htmlToDocument } from "../lib/scraping/html";
import { ContentType } from "../lib/types";

const PAGE = `<html>
<head><title>930E</title><style>p { color: red; }</style><script>var x = 1;</script></head>
<body>
<h1>930E Haul Truck</h1>
<p>Operating weight: <b>180,000 kg</b><br>Payload: 290 t</p>
<table>
  <tr><th>Engine model</th><td>Komatsu SSDA18V170</td></tr>
  <tr><td colspan="2">Dimensions</td></tr>
  <tr><td></td><td></td></tr>
  <tr><td>Overall   length</td><td>15.6 m</td></tr>
</table>
<dl><dt>Fuel tank</dt><dd>4,542 L</dd><dt>Tires</dt><dd>53/80R63</dd></dl>
<div>Contact <span>sales</span></div>
</body>
</html>`;

describe("htmlToDocument", () => {
  const document = htmlToDocument("https://www.komatsu.com/930e", PAGE, "2024-01-01T00:00:00.000Z");

  it("keeps prose without scripts, styles or table content", () => {
    expect(document.text).toBe("930E Haul Truck\nOperating weight: 180,000 kg\nPayload: 290 t\nContact sales");
  });

  it("extracts tables and definition lists", () => {
    expect(document.tables).toEqual([
      [
        ["Engine model", "Komatsu SSDA18V170"],
        ["Dimensions", ""],
        ["Overall length", "15.6 m"],
      ],
      [
        ["Fuel tank", "4,542 L"],
        ["Tires", "53/80R63"],
      ],
    ]);
  });

  it("fills in document metadata", () => {
    expect(document.url).toBe("https://www.komatsu.com/930e");
    expect(document.contentType).toBe(ContentType.HTML);
    expect(document.fetchedAt).toBe("2024-01-01T00:00:00.000Z");
    expect(document.sourceDomain).toBe("www.komatsu.com");
  });

  it("reads rows of nested tables once", () => {
    const nested = htmlToDocument(
      "https://example.com/",
      "<table><tr><td>Outer</td><td><table><tr><td>Inner</td><td>1</td></tr></table></td></tr></table>"
    );
    expect(nested.tables).toEqual([[["Outer", "Inner1"]], [["Inner", "1"]]]);
  });
});

describe("hostnameOf", () => {
  it("returns an empty string for invalid URLs", () => {
    expect(hostnameOf("https://Example.COM/x")).toBe("example.com");
    expect(hostnameOf("nope")).toBe("");
  });
});
