import { describe, it, expect } from "vitest";
import { RuleBasedInterpreter, looksLikeNaturalLanguage } from "./interpreter.js";

const aiConfig = {
  modelPath: "/tmp/model.onnx",
  apiEndpoint: "http://localhost:8000/ai",
  maxTokens: 512,
  temperature: 0.7,
};

describe("looksLikeNaturalLanguage", () => {
  it("matches trigger words as case-insensitive substrings", () => {
    expect(looksLikeNaturalLanguage("Show me the logs")).toBe(true);
    expect(looksLikeNaturalLanguage("INSTALL curl")).toBe(true);
    expect(looksLikeNaturalLanguage("playlist")).toBe(true);
  });

  it("leaves plain commands alone", () => {
    expect(looksLikeNaturalLanguage("ls -la")).toBe(false);
    expect(looksLikeNaturalLanguage("echo hello")).toBe(false);
    expect(looksLikeNaturalLanguage("pwd")).toBe(false);
  });
});

describe("RuleBasedInterpreter", () => {
  const interpreter = new RuleBasedInterpreter(aiConfig);

  it("maps file searches to find", async () => {
    expect(await interpreter.interpret("find all text files")).toBe("find . -type f");
    expect(await interpreter.interpret("FIND my FILES")).toBe("find . -type f");
  });

  it("maps process requests to ps", async () => {
    expect(await interpreter.interpret("show running processes")).toBe("ps aux");
  });

  it("maps install requests to the package-install stub", async () => {
    expect(await interpreter.interpret("install python package requests")).toBe("apt install");
  });

  it("applies the first matching rule", async () => {
    expect(await interpreter.interpret("find the file for this process")).toBe("find . -type f");
    expect(await interpreter.interpret("install the process monitor")).toBe("ps aux");
  });

  it("needs both words for the find rule", async () => {
    expect(await interpreter.interpret("find needle")).toBe("find needle");
  });

  it("returns unmatched input unchanged, in its original case", async () => {
    expect(await interpreter.interpret("Echo Hello World")).toBe("Echo Hello World");
  });

  it("is deterministic", async () => {
    const first = await interpreter.interpret("list every process");
    const second = await interpreter.interpret("list every process");
    expect(first).toBe("ps aux");
    expect(second).toBe(first);
  });

  it("keeps the backend settings it was built with", async () => {
    expect(interpreter.config.modelPath).toBe("/tmp/model.onnx");
    await expect(interpreter.initialize()).resolves.toBeUndefined();
    await expect(interpreter.updateModels()).resolves.toBeUndefined();
  });
});
