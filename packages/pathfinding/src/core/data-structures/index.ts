export { MinHeap, type MinHeapCompare } from "./min-heap";
