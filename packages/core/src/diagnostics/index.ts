export { compareArrays } from "./compareArrays";
