import { describe, expect, it, vi } from "vitest";

vi.mock("node:readline/promises", () => {
  const answers = ["typed answer"];
  return {
    createInterface: () => ({
      question: async () => answers.shift() ?? "",
      close: vi.fn(),
    }),
  };
});

describe("confirm", () => {
  it("accepts y", async () => {
    const { confirm } = await import("./ui.ts");
    await expect(confirm("Overwrite?", async () => "y")).resolves.toBe(true);
    await expect(confirm("Overwrite?", async () => " y\n")).resolves.toBe(true);
  });

  it("treats anything else as no", async () => {
    const { confirm } = await import("./ui.ts");
    await expect(confirm("Overwrite?", async () => "")).resolves.toBe(false);
    await expect(confirm("Overwrite?", async () => "n")).resolves.toBe(false);
    await expect(confirm("Overwrite?", async () => "yep")).resolves.toBe(false);
    await expect(confirm("Overwrite?", async () => "Y")).resolves.toBe(false);
    await expect(confirm("Overwrite?", async () => "yes")).resolves.toBe(false);
  });

  it("passes the prompt with the default answer hint", async () => {
    const { confirm } = await import("./ui.ts");
    const prompter = vi.fn(async () => "n");
    await confirm("Overwrite compose.yml?", prompter);
    expect(prompter).toHaveBeenCalledWith(expect.stringContaining("Overwrite compose.yml?"));
    expect(prompter).toHaveBeenCalledWith(expect.stringContaining("[y/N]"));
  });
});

describe("ask", () => {
  it("returns the line read from the terminal", async () => {
    const { ask } = await import("./ui.ts");
    await expect(ask("Name: ")).resolves.toBe("typed answer");
  });
});
