// Spring Boot entry point, placed in the package named by the request group

import type { TemplateContext } from "../types.js";

export function renderApplicationJava(context: TemplateContext): string {
  return [
    `package ${context.packageName};`,
    "",
    "import org.springframework.boot.SpringApplication;",
    "import org.springframework.boot.autoconfigure.SpringBootApplication;",
    "",
    "@SpringBootApplication",
    "public class Application {",
    "",
    "  public static void main(String... args) {",
    "    SpringApplication.run(Application.class, args);",
    "  }",
    "",
    "}",
    "",
  ].join("\n");
}
