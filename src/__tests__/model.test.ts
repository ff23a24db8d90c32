import { describe, it, expect } from "vitest";
import {
  Action,
  Data,
  Icon,
  Key,
  OutputItem,
  ResultType,
  ScriptFilterOutput,
  Text,
  normalizeModifierKey,
  normalizeResultType,
} from "../runtime/model";
import { NodefredErrorCode, isNodefredError } from "../lib/errors";

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected an error");
}

describe("model", () => {
  describe("OutputItem", () => {
    it("serializes a minimal item with the default type", () => {
      const item = new OutputItem({ title: "Hello Alfred!" });
      expect(JSON.stringify(item)).toBe('{"title":"Hello Alfred!","type":"default"}');
    });

    it("rejects an empty title", () => {
      const err = errorOf(() => new OutputItem({ title: "" }));
      expect(isNodefredError(err, NodefredErrorCode.INVALID_OUTPUT)).toBe(true);
      expect(err instanceof Error && err.message).toBe("title must be set");
    });

    it("writes fields in wire order under Alfred's key names", () => {
      const item = new OutputItem({
        type: ResultType.File,
        action: "some text",
        quicklookUrl: "https://example.com",
        text: new Text({ copy: "c", largeType: "L" }),
        autocomplete: "auto",
        match: "m",
        valid: false,
        icon: Icon.fileIcon("/Applications/Notes.app"),
        arg: "a",
        uid: "u1",
        subtitle: "sub",
        title: "t",
      });

      expect(JSON.stringify(item)).toBe(
        '{"title":"t","subtitle":"sub","uid":"u1","arg":"a",' +
          '"icon":{"path":"/Applications/Notes.app","type":"fileicon"},' +
          '"valid":false,"match":"m","autocomplete":"auto",' +
          '"text":{"copy":"c","largetype":"L"},' +
          '"quicklookurl":"https://example.com","action":"some text","type":"file"}'
      );
    });

    it("normalizes modifier keys given as enum members, names or a Map", () => {
      const alt = new Data({ subtitle: "with option" });
      const fromRecord = new OutputItem({ title: "t", mods: { [Key.Cmd]: new Data({ arg: "x" }), Option: alt } });
      const fromMap = new OutputItem({ title: "t", mods: new Map([[Key.Control, new Data({ valid: true })]]) });

      expect(fromRecord.toJSON().mods).toEqual({ cmd: new Data({ arg: "x" }), alt });
      expect(JSON.stringify(fromMap.toJSON().mods)).toBe('{"ctrl":{"valid":true}}');
    });

    it("keeps combined modifier strings as they are", () => {
      expect(normalizeModifierKey("cmd+alt")).toBe("cmd+alt");
      expect(normalizeModifierKey("Shift")).toBe("shift");
    });

    it("serializes a list argument as an array", () => {
      const item = new OutputItem({ title: "t", arg: ["a", "b"] });
      expect(JSON.stringify(item)).toBe('{"title":"t","arg":["a","b"],"type":"default"}');
    });

    it("serializes a typed action", () => {
      const item = new OutputItem({
        title: "t",
        action: new Action({ url: "https://example.com", file: ["~/a", "~/b"] }),
      });
      expect(JSON.stringify(item)).toBe(
        '{"title":"t","action":{"url":"https://example.com","file":["~/a","~/b"]},"type":"default"}'
      );
    });

    it("treats null fields as unset", () => {
      const item = new OutputItem({ title: "t", subtitle: null, uid: null, arg: null, action: null, type: null });

      expect(JSON.stringify(item)).toBe('{"title":"t","type":"default"}');
      expect(JSON.stringify(new Data({ subtitle: null, valid: true }))).toBe('{"valid":true}');
    });

    it("is immutable", () => {
      const item = new OutputItem({ title: "t", arg: ["a"] });
      expect(Object.isFrozen(item)).toBe(true);
      expect(Object.isFrozen(item.arg)).toBe(true);
    });
  });

  describe("ResultType", () => {
    it("accepts symbolic names and wire strings", () => {
      expect(normalizeResultType("FileSkipCheck")).toBe(ResultType.FileSkipCheck);
      expect(normalizeResultType("file:skipcheck")).toBe(ResultType.FileSkipCheck);
      expect(normalizeResultType(undefined)).toBe(ResultType.Default);
    });

    it("serializes FileSkipCheck with its colon", () => {
      const item = new OutputItem({ title: "t", type: ResultType.FileSkipCheck });
      expect(JSON.stringify(item)).toBe('{"title":"t","type":"file:skipcheck"}');
    });

    it("rejects unknown types", () => {
      const err = errorOf(() => new OutputItem({ title: "t", type: "folder" }));
      expect(err instanceof Error && err.message).toBe(
        "type must be one of default, file, file:skipcheck; got 'folder'"
      );
    });
  });

  describe("Icon", () => {
    it("omits the type for plain images", () => {
      expect(JSON.stringify(Icon.image("./icon.png"))).toBe('{"path":"./icon.png"}');
      expect(JSON.stringify(Icon.uti("public.jpeg"))).toBe('{"path":"public.jpeg","type":"filetype"}');
    });

    it("rejects other types", () => {
      const err = errorOf(() => new Icon("x", "image"));
      expect(isNodefredError(err, NodefredErrorCode.INVALID_OUTPUT)).toBe(true);
      expect(err instanceof Error && err.message).toBe("if set, icon type must be either fileicon or filetype");
    });
  });

  describe("Text", () => {
    it("needs copy or largeType", () => {
      const err = errorOf(() => new Text({}));
      expect(err instanceof Error && err.message).toBe("At least one of copy or largeType must be set");
    });

    it("counts null as absent", () => {
      const err = errorOf(() => new Text({ copy: null, largeType: null }));
      expect(isNodefredError(err, NodefredErrorCode.INVALID_OUTPUT)).toBe(true);
    });

    it("accepts an empty copy string", () => {
      expect(JSON.stringify(new Text({ copy: "" }))).toBe('{"copy":""}');
    });
  });

  describe("Action", () => {
    it("needs at least one field", () => {
      const err = errorOf(() => new Action({}));
      expect(err instanceof Error && err.message).toBe("At least one of text, url, file or auto must be set");
    });

    it("counts null as absent", () => {
      const err = errorOf(() => new Action({ text: null, url: null }));
      expect(isNodefredError(err, NodefredErrorCode.INVALID_OUTPUT)).toBe(true);
      expect(JSON.stringify(new Action({ url: "https://example.com", file: null }))).toBe(
        '{"url":"https://example.com"}'
      );
    });
  });

  describe("ScriptFilterOutput", () => {
    it("accepts rerun at both ends of the range", () => {
      expect(new ScriptFilterOutput({ rerun: 0.1 }).rerun).toBe(0.1);
      expect(new ScriptFilterOutput({ rerun: 5 }).rerun).toBe(5);
    });

    it.each([0, 0.05, 5.5, Number.NaN])("rejects rerun %s", (rerun) => {
      const err = errorOf(() => new ScriptFilterOutput({ rerun }));
      expect(isNodefredError(err, NodefredErrorCode.INVALID_OUTPUT)).toBe(true);
      expect(err instanceof Error && err.message).toBe("rerun must be between 0.1 and 5");
    });

    it("serializes rerun, items and variables", () => {
      const output = new ScriptFilterOutput({
        rerun: 1,
        items: [new OutputItem({ title: "one" })],
        variables: { page: "2" },
      });
      expect(JSON.stringify(output)).toBe(
        '{"rerun":1,"items":[{"title":"one","type":"default"}],"variables":{"page":"2"}}'
      );
    });

    it("leaves out a null rerun", () => {
      expect(JSON.stringify(new ScriptFilterOutput({ rerun: null, items: null }))).toBe("{}");
    });

    it("serializes an empty output as an empty object", () => {
      expect(JSON.stringify(new ScriptFilterOutput())).toBe("{}");
    });
  });
});
