export { loadTransformersModel } from "./transformers.js";
