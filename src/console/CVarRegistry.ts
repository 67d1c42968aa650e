import { CVar, type CVarCategory, type CVarDesc } from "./CVar.js";

export class CVarRegistry {
  private cvars = new Map<string, CVar>();

  register(desc: CVarDesc): CVar {
    if (this.cvars.has(desc.name)) {
      throw new Error(`[cvar] duplicate registration: ${desc.name}`);
    }
    const cv = new CVar(desc);
    this.cvars.set(desc.name, cv);
    return cv;
  }

  unregister(name: string): void {
    this.cvars.delete(name);
  }

  get(name: string): CVar | undefined {
    return this.cvars.get(name);
  }

  getAll(): CVar[] {
    return [...this.cvars.values()];
  }

  getByCategory(category: CVarCategory): CVar[] {
    return this.getAll().filter((cv) => cv.category === category);
  }

  resetAll(): void {
    for (const cv of this.cvars.values()) cv.reset();
  }
}
