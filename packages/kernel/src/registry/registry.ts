import type { Bibliography } from '../bibliography/bibliography.js';

/**
 * Registry of weakly held objects addressed by string handles.
 *
 * Holders keep the handle instead of the object itself, so an association
 * never keeps its target alive. Entries whose target was collected are
 * dropped on lookup or by the finalizer, whichever comes first.
 */
export class HandleRegistry<T extends object> {
  private readonly targets = new Map<string, WeakRef<T>>();
  private readonly finalizer = new FinalizationRegistry<string>((id) => {
    const ref = this.targets.get(id);
    if (ref && ref.deref() === undefined) {
      this.targets.delete(id);
    }
  });

  register(id: string, target: T): void {
    if (this.get(id) !== undefined) {
      throw new Error(`Handle '${id}' is already registered`);
    }

    this.targets.set(id, new WeakRef(target));
    this.finalizer.register(target, id, target);
  }

  unregister(id: string): boolean {
    const target = this.targets.get(id)?.deref();
    if (target) {
      this.finalizer.unregister(target);
    }
    return this.targets.delete(id);
  }

  get(id: string): T | undefined {
    const ref = this.targets.get(id);
    if (!ref) return undefined;

    const target = ref.deref();
    if (target === undefined) {
      this.targets.delete(id);
    }
    return target;
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  clear(): void {
    for (const id of Array.from(this.targets.keys())) {
      this.unregister(id);
    }
  }

  size(): number {
    return this.targets.size;
  }
}

/**
 * Process-wide lookup behind the element → bibliography association.
 */
export const bibliographyRegistry = new HandleRegistry<Bibliography>();
