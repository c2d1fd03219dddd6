// Host side of the foreign module's linear memory.
// Provides the `env.__alloc` and `env.__free` imports the module calls when it
// constructs and destroys a record, and the text helpers the bridge uses to
// move strings across.
//
// String memory layout: [length: u32 (4 bytes)][utf8 data: length bytes]
// A string pointer (i32) points to the length prefix.
//
// The WASM module owns the memory and exports it; the heap binds to it after
// instantiation.

const PAGE_SIZE = 65536;
const DEFAULT_HEAP_BASE = 1024;

export interface ForeignHeap {
  readonly memory: WebAssembly.Memory;
  readonly imports: { env: { __alloc(size: number): number; __free(ptr: number): void } };
  alloc(size: number): number;
  /** Returns a block to its free-list. Untracked or already freed pointers are ignored. */
  free(ptr: number): void;
  view(): DataView;
  writeString(str: string): number;
  /** Decodes a string view eagerly. Returns null when the bytes are not valid UTF-8. */
  readText(ptr: number): string | null;
  readBytes(ptr: number): Uint8Array;
  writeBytes(bytes: Uint8Array): number;
  bindMemory(mem: WebAssembly.Memory): void;
  setHeapBase(base: number): void;
  getHeapPtr(): number;
}

export function createForeignHeap(): ForeignHeap {
  // Memory is set after instantiation via bindMemory()
  let memory: WebAssembly.Memory | null = null;
  let heapPtr = DEFAULT_HEAP_BASE;

  // Free-list allocator: every block is rounded up to a power-of-two size
  // class (minimum 8 bytes) and goes back on its class's list when freed.
  //
  // liveBlocks: ptr -> size class of a block currently handed out
  // freeLists:  size class -> stack of free block pointers
  const liveBlocks = new Map<number, number>();
  const freeLists = new Map<number, number[]>();

  const strictDecoder = new TextDecoder("utf-8", { fatal: true });
  const encoder = new TextEncoder();

  function mem(): WebAssembly.Memory {
    if (!memory) {
      throw new Error("Foreign heap is not bound to a module memory yet");
    }
    return memory;
  }

  /** Round `size` up to the next power of two, minimum 8. */
  function sizeClass(size: number): number {
    let cls = 8;
    while (cls < size) cls *= 2;
    return cls;
  }

  /**
   * Allocator backing `__alloc`. A freed block of the same size class is
   * reused first; otherwise the block is bump-allocated. Blocks are 8-byte
   * aligned so f64 fields sit on their natural boundary. Memory grows
   * page-wise on demand; growing past the module's maximum throws the
   * engine's RangeError.
   */
  function alloc(size: number): number {
    const m = mem();
    const cls = sizeClass(size);

    const reused = freeLists.get(cls)?.pop();
    if (reused !== undefined) {
      liveBlocks.set(reused, cls);
      return reused;
    }

    heapPtr = (heapPtr + 7) & ~7;
    const ptr = heapPtr;
    const needed = ptr + cls;
    if (needed > m.buffer.byteLength) {
      const pages = Math.ceil((needed - m.buffer.byteLength) / PAGE_SIZE);
      m.grow(pages);
    }
    heapPtr = needed;
    liveBlocks.set(ptr, cls);
    return ptr;
  }

  function free(ptr: number): void {
    const cls = liveBlocks.get(ptr);
    if (cls === undefined) return;
    liveBlocks.delete(ptr);
    let list = freeLists.get(cls);
    if (!list) {
      list = [];
      freeLists.set(cls, list);
    }
    list.push(ptr);
  }

  function view(): DataView {
    // Re-created on every call: memory.grow() detaches the previous buffer.
    return new DataView(mem().buffer);
  }

  function readBytes(ptr: number): Uint8Array {
    const buffer = mem().buffer;
    const len = new DataView(buffer).getUint32(ptr, true); // little-endian
    return new Uint8Array(buffer, ptr + 4, len);
  }

  function writeBytes(bytes: Uint8Array): number {
    const ptr = alloc(4 + bytes.length);
    const buffer = mem().buffer;
    new DataView(buffer).setUint32(ptr, bytes.length, true);
    new Uint8Array(buffer, ptr + 4, bytes.length).set(bytes);
    return ptr;
  }

  function writeString(str: string): number {
    return writeBytes(encoder.encode(str));
  }

  function readText(ptr: number): string | null {
    const bytes = readBytes(ptr);
    try {
      return strictDecoder.decode(bytes);
    } catch (e) {
      if (e instanceof TypeError) return null;
      throw e;
    }
  }

  return {
    get memory() { return mem(); },
    imports: {
      env: {
        __alloc(size: number): number {
          return alloc(size);
        },
        __free(ptr: number): void {
          free(ptr);
        },
      },
    },
    alloc,
    free,
    view,
    writeString,
    readText,
    readBytes,
    writeBytes,
    bindMemory(mem: WebAssembly.Memory) {
      memory = mem;
    },
    setHeapBase(base: number) {
      heapPtr = base;
      liveBlocks.clear();
      freeLists.clear();
    },
    getHeapPtr() { return heapPtr; },
  };
}
