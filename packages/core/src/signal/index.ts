export { toDecibel, fromDecibel } from "./levels";
export { rms } from "./rms";
