import * as yaml from "js-yaml";

/**
 * Parse YAML string to an unknown value
 * Throws js-yaml's YAMLException on malformed input
 */
export function fromYaml(yamlContent: string, filename?: string): unknown {
  return yaml.load(yamlContent, filename ? { filename } : {});
}
