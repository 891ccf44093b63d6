import { describe, expect, it } from "vitest";
import { ProbeNotFoundError } from "../src/errors.js";
import {
  anyVisible,
  bindProbeChain,
  escapeQuotedSelectorText,
  requireProbe,
  resolveAll,
  resolveProbeChain
} from "../src/probe.js";
import type { PageContext, ProbeChain } from "../src/types.js";
import { FakePage } from "./helpers/fakePage.js";

function chain(...selectors: string[]): ProbeChain {
  return { name: "testChain", probes: selectors.map((selector) => ({ label: `label ${selector}`, selector })) };
}

describe("resolveProbeChain", () => {
  it("skips an invisible match and stops at the first probe with a visible one", async () => {
    const page = new FakePage();
    page.add("first", { visible: false });
    const winner = page.add("second", { text: "winner" });
    page.add("third");

    await expect(resolveProbeChain(chain("first", "second", "third"), page)).resolves.toBe(winner);
    expect(page.queried).toEqual(["first", "second"]);
  });

  it("returns the first visible candidate in document order", async () => {
    const page = new FakePage();
    page.add("item", { visible: false, text: "hidden" });
    const visible = page.add("item", { text: "shown" });
    page.add("item", { text: "later" });

    await expect(resolveProbeChain(chain("item"), page)).resolves.toBe(visible);
  });

  it("honours pick last and attached state", async () => {
    const page = new FakePage();
    page.add("message", { text: "one" });
    const last = page.add("message", { text: "two" });
    const hiddenInput = page.add("input[type=file]", { visible: false });

    const lastChain: ProbeChain = { name: "messages", probes: [{ label: "m", selector: "message", pick: "last" }] };
    const attachedChain: ProbeChain = {
      name: "file",
      probes: [{ label: "f", selector: "input[type=file]", state: "attached" }]
    };

    await expect(resolveProbeChain(lastChain, page)).resolves.toBe(last);
    await expect(resolveProbeChain(attachedChain, page)).resolves.toBe(hiddenInput);
  });

  it("treats a failing visibility check as invisible", async () => {
    const context: PageContext<string> = {
      queryAll: async (probe) => [probe.selector],
      isVisible: async (element) => {
        if (element === "detached") {
          throw new Error("element is detached");
        }
        return true;
      }
    };

    await expect(resolveProbeChain(chain("detached", "attached"), context)).resolves.toBe("attached");
  });

  it("treats a failing query as no match", async () => {
    const context: PageContext<string> = {
      queryAll: async () => {
        throw new Error("bad selector");
      },
      isVisible: async () => true
    };

    await expect(resolveProbeChain(chain("x"), context)).resolves.toBeUndefined();
  });
});

describe("requireProbe and friends", () => {
  it("names the chain and the probes tried", async () => {
    const page = new FakePage();

    const failure = requireProbe(chain("a", "b"), page);

    await expect(failure).rejects.toBeInstanceOf(ProbeNotFoundError);
    await expect(requireProbe(chain("a", "b"), page)).rejects.toThrow(
      "No visible element for probe chain 'testChain'. Tried:\n- label a\n- label b"
    );
  });

  it("lists every visible candidate of the winning probe only", async () => {
    const page = new FakePage();
    page.add("card", { visible: false });
    const one = page.add("row", { text: "1" });
    const two = page.add("row", { text: "2" });
    page.add("cell");

    const resolved = await resolveAll(chain("card", "row", "cell"), page);

    expect(resolved?.probe.selector).toBe("row");
    expect(resolved?.elements).toEqual([one, two]);
    await expect(anyVisible(chain("card"), page)).resolves.toBe(false);
  });
});

describe("bindProbeChain", () => {
  const template: ProbeChain = {
    name: "notebookByTitle",
    probes: [
      { label: 'exact "{title}"', selector: 'text="{title}"' },
      { label: "prefix {short}", selector: "text={short}" },
      { label: "link", selector: 'a[href*="/notebook/"]', hasText: "{short}" },
      { label: "unknown", selector: "text={missing}" }
    ]
  };

  it("escapes values inside quoted selector text only", () => {
    const bound = bindProbeChain(template, { title: 'Say "hi" \\ now', short: 'Say "hi"' });

    expect(bound.probes.map((probe) => probe.selector)).toEqual([
      'text="Say \\"hi\\" \\\\ now"',
      'text=Say "hi"',
      'a[href*="/notebook/"]',
      "text={missing}"
    ]);
    expect(bound.probes[0]?.label).toBe('exact "Say "hi" \\ now"');
    expect(bound.probes[2]?.hasText).toBe('Say "hi"');
    expect(template.probes[0]?.selector).toBe('text="{title}"');
  });

  it("escapes backslashes before quotes", () => {
    expect(escapeQuotedSelectorText('a\\"b')).toBe('a\\\\\\"b');
  });
});
