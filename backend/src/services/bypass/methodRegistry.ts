import { readFileSync } from 'fs';
import { CatalogError, errorMessage } from './errors';
import { formatIssues, methodCatalogSchema } from '../../utils/validation/catalogSchemas';
import type { BypassMethodDescriptor } from '../../types/bypass';

/**
 * Ordered set of descriptors. Registration order is the final ranking
 * tie-breaker, so it is preserved exactly.
 */
export class MethodRegistry {
  private readonly methods: BypassMethodDescriptor[] = [];
  private readonly byName = new Map<string, number>();

  constructor(descriptors: readonly BypassMethodDescriptor[] = []) {
    descriptors.forEach(descriptor => this.register(descriptor));
  }

  static fromFile(filePath: string): MethodRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new CatalogError(
        `Cannot read method catalog: ${errorMessage(error)}`,
        filePath
      );
    }

    const parsed = methodCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogError(`Invalid method catalog: ${formatIssues(parsed.error)}`, filePath);
    }
    return new MethodRegistry(parsed.data.methods);
  }

  register(descriptor: BypassMethodDescriptor): void {
    if (this.byName.has(descriptor.name)) {
      throw new CatalogError(`Duplicate method name '${descriptor.name}'`, 'registry');
    }
    this.byName.set(descriptor.name, this.methods.length);
    this.methods.push(Object.freeze({ ...descriptor, steps: Object.freeze([...descriptor.steps]) }));
  }

  get(name: string): BypassMethodDescriptor | undefined {
    const index = this.byName.get(name);
    return index === undefined ? undefined : this.methods[index];
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Declaration position, or -1 when unknown */
  indexOf(name: string): number {
    return this.byName.get(name) ?? -1;
  }

  all(): readonly BypassMethodDescriptor[] {
    return this.methods;
  }

  get size(): number {
    return this.methods.length;
  }
}
