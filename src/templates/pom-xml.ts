// Maven build descriptor: BOM imports, resolved dependencies, Boot plugin

import type { Dependency, TemplateContext } from "../types.js";

export function renderPomXml(context: TemplateContext): string {
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<project xmlns="http://maven.apache.org/POM/4.0.0" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance"`,
    `         xsi:schemaLocation="http://maven.apache.org/POM/4.0.0 http://maven.apache.org/xsd/maven-4.0.0.xsd">`,
    "  <modelVersion>4.0.0</modelVersion>",
    "",
    `  <groupId>${xml(context.group)}</groupId>`,
    `  <artifactId>${xml(context.artifact)}</artifactId>`,
    `  <version>${xml(context.projectVersion)}</version>`,
    "",
    "  <properties>",
    "    <project.build.sourceEncoding>UTF-8</project.build.sourceEncoding>",
    `    <maven.compiler.source>${xml(context.javaVersion)}</maven.compiler.source>`,
    `    <maven.compiler.target>${xml(context.javaVersion)}</maven.compiler.target>`,
    "  </properties>",
    "",
    "  <dependencyManagement>",
    "    <dependencies>",
    ...bomImport("org.springframework.boot", "spring-boot-dependencies", context.springBootVersion),
    ...bomImport("org.camunda.bpm", "camunda-bom", context.camundaVersion),
    "    </dependencies>",
    "  </dependencyManagement>",
    "",
    "  <dependencies>",
    ...context.dependencies.flatMap(dependencyBlock),
    "  </dependencies>",
    "",
    "  <build>",
    "    <plugins>",
    "      <plugin>",
    "        <groupId>org.springframework.boot</groupId>",
    "        <artifactId>spring-boot-maven-plugin</artifactId>",
    `        <version>${xml(context.springBootVersion)}</version>`,
    "      </plugin>",
    "    </plugins>",
    "  </build>",
    "",
    "</project>",
    "",
  ];
  return lines.join("\n");
}

function bomImport(group: string, artifact: string, version: string): string[] {
  return [
    "      <dependency>",
    `        <groupId>${group}</groupId>`,
    `        <artifactId>${artifact}</artifactId>`,
    `        <version>${xml(version)}</version>`,
    "        <type>pom</type>",
    "        <scope>import</scope>",
    "      </dependency>",
  ];
}

function dependencyBlock(dep: Dependency): string[] {
  const block = [
    "    <dependency>",
    `      <groupId>${xml(dep.group)}</groupId>`,
    `      <artifactId>${xml(dep.artifact)}</artifactId>`,
  ];
  if (dep.version !== undefined) block.push(`      <version>${xml(dep.version)}</version>`);
  block.push("    </dependency>");
  return block;
}

function xml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
