// Runtime configuration: datasource and Camunda admin user

import type { TemplateContext } from "../types.js";

const JDBC_URLS: Readonly<Record<string, string>> = {
  postgresql: "jdbc:postgresql://localhost:5432/",
  mysql: "jdbc:mysql://localhost:3306/",
};

export function renderApplicationYaml(context: TemplateContext): string {
  const lines: string[] = [];

  const jdbcBase = Object.prototype.hasOwnProperty.call(JDBC_URLS, context.dbType)
    ? JDBC_URLS[context.dbType]
    : undefined;

  if (jdbcBase) {
    lines.push(
      "spring.datasource:",
      `  url: ${quote(jdbcBase + context.artifact)}`,
      `  username: ${quote(context.adminUsername)}`,
      `  password: ${quote(context.adminPassword)}`,
    );
    if (context.dbClassRef) {
      lines.push(`  hikari.data-source-class-name: ${context.dbClassRef}`);
    }
  } else {
    lines.push(
      "spring.datasource:",
      `  url: ${quote(`jdbc:h2:file:./${context.artifact}-db`)}`,
    );
  }

  lines.push(
    "",
    "camunda.bpm.admin-user:",
    `  id: ${quote(context.adminUsername)}`,
    `  password: ${quote(context.adminPassword)}`,
    "",
  );

  return lines.join("\n");
}

// YAML double-quoted scalars accept JSON string escapes
function quote(value: string): string {
  return JSON.stringify(value);
}
