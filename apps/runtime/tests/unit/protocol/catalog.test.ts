import { describe, expect, it } from "vitest";
import {
  BUILTIN_MESSAGE_TYPES,
  createDefaultCatalog,
  DuplicateMessageTypeError,
  MessageCatalog,
  MessageTypes,
  UnknownMessageTypeError,
} from "../../../src/protocol/catalog.js";

describe("MessageCatalog", () => {
  it("holds every built-in type with a unique tag", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.list()).toHaveLength(BUILTIN_MESSAGE_TYPES.length);
    const tags = new Set(catalog.list().map((def) => def.tag));
    expect(tags.size).toBe(BUILTIN_MESSAGE_TYPES.length);
  });

  it("looks types up by name and by tag", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.tagOf(MessageTypes.ThemeChanged)).toBe(7);
    expect(catalog.getByTag(64)?.type).toBe(MessageTypes.TerminalOutput);
    expect(catalog.has("plugin.custom")).toBe(false);
  });

  it("reports the update policy of each type", () => {
    const catalog = createDefaultCatalog();
    expect(catalog.policyOf(MessageTypes.GraphRender)).toBe("replaceable");
    expect(catalog.policyOf(MessageTypes.TerminalOutput)).toBe("high-frequency");
    expect(catalog.policyOf(MessageTypes.BreakpointAdded)).toBe("normal");
    expect(catalog.policyOf("plugin.custom")).toBe("normal");
  });

  it("throws for the tag of an unknown type", () => {
    expect(() => createDefaultCatalog().tagOf("plugin.custom")).toThrow(UnknownMessageTypeError);
  });

  it("accepts extra types next to the built-ins", () => {
    const catalog = createDefaultCatalog([
      { type: "plugin.custom", tag: 1000, policy: "replaceable" },
    ]);
    expect(catalog.tagOf("plugin.custom")).toBe(1000);
    expect(catalog.policyOf("plugin.custom")).toBe("replaceable");
  });

  it("rejects a duplicate type or tag", () => {
    const catalog = new MessageCatalog([{ type: "a.one", tag: 1, policy: "normal" }]);
    expect(() => catalog.register({ type: "a.one", tag: 2, policy: "normal" })).toThrow(
      DuplicateMessageTypeError,
    );
    expect(() => catalog.register({ type: "a.two", tag: 1, policy: "normal" })).toThrow(
      'Message tag 1 is already registered',
    );
  });

  it("rejects malformed names and out-of-range tags", () => {
    const catalog = new MessageCatalog();
    expect(() => catalog.register({ type: "nodot", tag: 1, policy: "normal" })).toThrow(
      /expected dotted lowercase segments/,
    );
    expect(() => catalog.register({ type: "a.b", tag: 0, policy: "normal" })).toThrow(RangeError);
    expect(() => catalog.register({ type: "a.b", tag: 0x10000, policy: "normal" })).toThrow(
      RangeError,
    );
  });

  it("freezes registered definitions", () => {
    const def = createDefaultCatalog().get(MessageTypes.Notice);
    expect(def !== undefined && Object.isFrozen(def)).toBe(true);
  });
});
