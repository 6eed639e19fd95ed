export * from "./value";
export { fromYaml, parseYaml, stringifyYaml } from "./yaml";
