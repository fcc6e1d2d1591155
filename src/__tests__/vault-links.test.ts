import { describe, test, expect } from "vitest";
import { CorpusIndex } from "../corpus/corpus-index";
import { createSegment } from "../plans/segment";
import { VaultLinker } from "../render/vault-links";
import { makeBook } from "./fixtures";

const genesis = makeBook("Genesis", [31, 25, 24, 26], { position: 1 });
const corpus = new CorpusIndex([genesis]);
const range = createSegment(corpus, genesis, 1, 2);
const single = createSegment(corpus, genesis, 3, 3);

const G1 = "[[Bible/ESV/01 - Genesis/Genesis 1|Genesis 1]]";
const G2 = "[[Bible/ESV/01 - Genesis/Genesis 2|Genesis 2]]";

describe("VaultLinker", () => {
  test("normalises the vault folder", () => {
    expect(new VaultLinker("\\Bible\\ESV\\").vaultFolder).toBe("Bible/ESV");
    expect(new VaultLinker("/Scripture/").vaultFolder).toBe("Scripture");
  });

  test("links each chapter under the numbered book folder", () => {
    const linker = new VaultLinker("Bible/ESV");
    expect(linker.chapterLinks(range)).toEqual([
      { chapter: 1, path: "Bible/ESV/01 - Genesis/Genesis 1", label: "Genesis 1" },
      { chapter: 2, path: "Bible/ESV/01 - Genesis/Genesis 2", label: "Genesis 2" },
    ]);
  });

  test("expanded style puts one bold link per line", () => {
    expect(new VaultLinker("Bible/ESV", "expanded").formatSegment(range)).toBe(`**${G1}**\n**${G2}**`);
  });

  test("inline style lists chapter numbers after the range", () => {
    const linker = new VaultLinker("Bible/ESV", "inline");
    expect(linker.formatSegment(range)).toBe(
      "**Genesis 1-2** ([[Bible/ESV/01 - Genesis/Genesis 1|1]], [[Bible/ESV/01 - Genesis/Genesis 2|2]])",
    );
    expect(linker.formatSegment(single)).toBe("**[[Bible/ESV/01 - Genesis/Genesis 3|Genesis 3]]**");
  });

  test("hybrid style puts a bullet list under the range", () => {
    expect(new VaultLinker("Bible/ESV", "hybrid").formatSegment(range)).toBe(
      `**Genesis 1-2**\n- ${G1}\n- ${G2}`,
    );
  });

  test("pads the book number to two digits", () => {
    const revelation = makeBook("Revelation", [20, 29], { position: 66, testament: "new" });
    const segment = createSegment(new CorpusIndex([revelation]), revelation, 2, 2);
    expect(new VaultLinker("Scripture").frontmatterPaths([segment])).toEqual([
      "Scripture/66 - Revelation/Revelation 2",
    ]);
  });
});
