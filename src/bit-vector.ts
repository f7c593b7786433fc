/** Bits per storage page (128 KiB of bytes) */
const PAGE_BITS = 2 ** 20;

/**
 * Fixed-length bit array holding exactly one bit per slot.
 *
 * Storage is split into pages that are allocated on first write, so a
 * large but sparsely populated vector only pays for the pages it touches.
 * Reading a slot on an untouched page yields `false`.
 */
export class BitVector {
  private pages: Array<Uint8Array | undefined> = [];
  private _length = 0;

  /**
   * @param length - Number of bits, a positive integer
   * @throws {RangeError} If length is not a positive integer
   */
  constructor(length: number) {
    this.resize(length);
  }

  /** Number of bits */
  get length(): number {
    return this._length;
  }

  get(index: number): boolean {
    this.checkIndex(index);
    const page = this.pages[Math.floor(index / PAGE_BITS)];
    if (page === undefined) {
      return false;
    }
    const offset = index % PAGE_BITS;
    const byte = page[offset >>> 3];
    return byte !== undefined && (byte & (1 << (offset & 7))) !== 0;
  }

  set(index: number): void {
    this.checkIndex(index);
    const pageIndex = Math.floor(index / PAGE_BITS);
    let page = this.pages[pageIndex];
    if (page === undefined) {
      page = new Uint8Array(this.pageBytes());
      this.pages[pageIndex] = page;
    }
    const offset = index % PAGE_BITS;
    const byteIndex = offset >>> 3;
    const current = page[byteIndex];
    if (current !== undefined) {
      page[byteIndex] = current | (1 << (offset & 7));
    }
  }

  /**
   * Changes the number of bits. Bits below the new length keep their
   * value; bits added past the old length start cleared.
   * @throws {RangeError} If length is not a positive integer
   */
  resize(length: number): void {
    if (!Number.isSafeInteger(length) || length <= 0) {
      throw new RangeError(`BitVector length must be a positive integer, got ${length}`);
    }

    const pageCount = Math.ceil(length / PAGE_BITS);
    const pageBytes = Math.ceil(Math.min(length, PAGE_BITS) / 8);
    const pages = new Array<Uint8Array | undefined>(pageCount);
    const kept = Math.min(pageCount, this.pages.length);

    for (let i = 0; i < kept; i++) {
      const page = this.pages[i];
      if (page === undefined) continue;
      if (page.length === pageBytes) {
        pages[i] = page;
      } else {
        const resized = new Uint8Array(pageBytes);
        resized.set(page.subarray(0, pageBytes));
        pages[i] = resized;
      }
    }

    // Bits past the new length must read as cleared if the vector grows again
    const lastPage = pages[pageCount - 1];
    if (lastPage !== undefined) {
      const usedBits = length - (pageCount - 1) * PAGE_BITS;
      lastPage.fill(0, Math.ceil(usedBits / 8));
      const tailBits = usedBits % 8;
      const byteIndex = Math.floor(usedBits / 8);
      const byte = lastPage[byteIndex];
      if (tailBits !== 0 && byte !== undefined) {
        lastPage[byteIndex] = byte & ((1 << tailBits) - 1);
      }
    }

    this.pages = pages;
    this._length = length;
  }

  /** Number of bits currently set */
  count(): number {
    let total = 0;
    for (const page of this.pages) {
      if (page === undefined) continue;
      for (const byte of page) {
        total += popcount8(byte);
      }
    }
    return total;
  }

  private pageBytes(): number {
    return Math.ceil(Math.min(this._length, PAGE_BITS) / 8);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._length) {
      throw new RangeError(`Bit index ${index} out of range [0, ${this._length})`);
    }
  }
}

function popcount8(byte: number): number {
  let v = byte - ((byte >>> 1) & 0x55);
  v = (v & 0x33) + ((v >>> 2) & 0x33);
  return (v + (v >>> 4)) & 0x0f;
}
