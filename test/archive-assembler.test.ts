import { describe, it, expect, vi } from "vitest";
import { strFromU8, strToU8, unzipSync } from "fflate";
import {
  assembleArchive,
  archiveLayout,
  renderFile,
  zipEntries,
} from "../src/archive-assembler.js";
import { createBuiltinRenderer } from "../src/template-renderer.js";
import { renderPomXml } from "../src/templates/pom-xml.js";
import {
  UnrecognizedSelectionError,
  type TemplateContext,
  type TemplateRenderer,
} from "../src/types.js";

const context: TemplateContext = {
  packageName: "org.acme.loans",
  dbType: "h2",
  dbClassRef: "",
  adminUsername: "demo",
  adminPassword: "demo",
  camundaVersion: "7.12.0",
  springBootVersion: "2.2.1.RELEASE",
  javaVersion: "12",
  group: "org.acme.loans",
  artifact: "loan-approval",
  projectVersion: "1.0.0-SNAPSHOT",
  dependencies: [
    { group: "org.camunda.bpm.springboot", artifact: "camunda-bpm-spring-boot-starter-rest", version: "3.4.0" },
    { group: "com.h2database", artifact: "h2" },
  ],
};

describe("archiveLayout", () => {
  it("roots every file at the artifact directory", () => {
    expect(archiveLayout(context)).toEqual({
      "Application.java": "loan-approval/src/main/java/org/acme/loans/Application.java",
      "application.yaml": "loan-approval/src/main/resources/application.yaml",
      "pom.xml": "loan-approval/pom.xml",
    });
  });

  it("handles a single-segment group", () => {
    expect(archiveLayout({ ...context, group: "demo" })["Application.java"]).toBe(
      "loan-approval/src/main/java/demo/Application.java",
    );
  });

  it.each(["../../escape", "a/b", "a\\b", "..", ".", ""])(
    "rejects artifact %j that would leave the project root",
    (artifact) => {
      expect(() => archiveLayout({ ...context, artifact })).toThrow(
        new UnrecognizedSelectionError("artifact", artifact),
      );
    },
  );

  it.each(["org/../../escape", "org..acme", "org.acme.", "org\\acme"])(
    "rejects group %j that does not map to package directories",
    (group) => {
      expect(() => archiveLayout({ ...context, group })).toThrow(
        new UnrecognizedSelectionError("group", group),
      );
    },
  );
});

describe("assembleArchive", () => {
  const renderer = createBuiltinRenderer();

  it("contains exactly the three project files", () => {
    const files = unzipSync(assembleArchive(context, renderer));
    expect(Object.keys(files)).toEqual([
      "loan-approval/pom.xml",
      "loan-approval/src/main/java/org/acme/loans/Application.java",
      "loan-approval/src/main/resources/application.yaml",
    ]);
    expect(strFromU8(files["loan-approval/pom.xml"])).toBe(renderPomXml(context));
  });

  it("is byte-for-byte deterministic", () => {
    const first = assembleArchive(context, renderer);
    const second = assembleArchive(structuredClone(context), renderer);
    expect(Buffer.from(second).equals(Buffer.from(first))).toBe(true);
  });

  it("stamps entries with 2020-01-01 00:00 in DOS time and date fields", () => {
    const archive = assembleArchive(context, renderer);
    // local file header: time at offset 10, date at 12, both little-endian
    expect(Array.from(archive.subarray(10, 14))).toEqual([0x00, 0x00, 0x21, 0x50]);
  });

  it("rejects an escaping artifact before rendering anything", () => {
    const render = vi.fn(() => "");
    expect(() => assembleArchive({ ...context, artifact: "../x" }, { render })).toThrow(
      UnrecognizedSelectionError,
    );
    expect(render).not.toHaveBeenCalled();
  });

  it("renders every file before packing and propagates renderer errors unchanged", () => {
    const failure = new Error("template exploded");
    const failing: TemplateRenderer = {
      render: vi.fn((_ctx: TemplateContext, id: string) => {
        if (id === "application.yaml") throw failure;
        return id;
      }),
    };
    expect(() => assembleArchive(context, failing)).toThrow(failure);
  });
});

describe("renderFile", () => {
  it("renders a single file as text", () => {
    expect(renderFile(context, "pom.xml", createBuiltinRenderer())).toBe(renderPomXml(context));
  });

  it("rejects file ids outside the project layout", () => {
    const renderer: TemplateRenderer = { render: vi.fn(() => "") };
    expect(() => renderFile(context, "README.md", renderer)).toThrow(UnrecognizedSelectionError);
    expect(renderer.render).not.toHaveBeenCalled();
  });
});

describe("zipEntries", () => {
  it("orders entries by path regardless of input order", () => {
    const a = zipEntries([
      { path: "p/b.txt", bytes: strToU8("b") },
      { path: "p/a.txt", bytes: strToU8("a") },
    ]);
    const b = zipEntries([
      { path: "p/a.txt", bytes: strToU8("a") },
      { path: "p/b.txt", bytes: strToU8("b") },
    ]);
    expect(Object.keys(unzipSync(a))).toEqual(["p/a.txt", "p/b.txt"]);
    expect(Buffer.from(a).equals(Buffer.from(b))).toBe(true);
  });
});
