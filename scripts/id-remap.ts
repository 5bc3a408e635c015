// Old id -> new id mapping, shared by vertices, materials, textures and texture vertices.
// The next id handed out is always the current size (plus the caller's offset).

export class IdRemapTable {
  private readonly ids = new Map<number, number>();

  get size(): number {
    return this.ids.size;
  }

  // Return the recorded id, or record size + offset on first sight
  resolve(oldId: number, offset = 0): number {
    const known = this.ids.get(oldId);
    if (known !== undefined) return known;
    const newId = this.ids.size + offset;
    this.ids.set(oldId, newId);
    return newId;
  }

  set(oldId: number, newId: number): void {
    this.ids.set(oldId, newId);
  }

  get(oldId: number): number | undefined {
    return this.ids.get(oldId);
  }

  has(oldId: number): boolean {
    return this.ids.has(oldId);
  }

  entries(): IterableIterator<[number, number]> {
    return this.ids.entries();
  }
}
