export { buildDynamic, lazilyValidate, EnvironmentError } from "./environment";
