export { asArray1d, broadcast1d } from "./validate";
export {
  toNdArray,
  toNdArrayBy,
  fromNdArray,
  squeeze,
  toRows,
  mapElements,
  sizeOf,
  shapesEqual,
} from "./ndarray";
