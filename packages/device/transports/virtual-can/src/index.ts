export { cloneFrame, createFrame, type FrameInit, frameBits } from "./frame.js";
export { RingBuffer } from "./ring-buffer.js";
export { formatCandump, formatTraceCsv } from "./trace-format.js";
export * from "./types.js";
export { VirtualCanBus } from "./virtual-bus.js";
