export { type Content, element, mathSpan } from "./element";
