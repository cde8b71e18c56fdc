export { stack, interleaveChannels } from "./compose";
