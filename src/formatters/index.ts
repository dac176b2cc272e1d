export {
  FormatterRegistry,
  createRegistry,
  type FormatterCallback,
  type FormatterEntry,
} from "./registry.js";
