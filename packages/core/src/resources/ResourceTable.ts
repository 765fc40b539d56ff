import { ConfigError } from '../errors/index.js';
import { getLogger, type LoggingService } from '../services/LoggingService.js';

/**
 * Ordered registry of resources keyed by id.
 *
 * Registering an id that already exists replaces the entry in place, so
 * table order stays the order of first registration. Once frozen, the
 * table is read-only.
 */
export class ResourceTable<T extends { readonly id: string }> {
  private readonly entries = new Map<string, T>();
  private frozen = false;

  constructor(
    protected readonly label: string,
    protected readonly logger: LoggingService = getLogger()
  ) {}

  register(item: T): T {
    if (this.frozen) {
      throw new ConfigError(
        `Cannot register "${item.id}": the ${this.label} is frozen`,
        { id: item.id, table: this.label },
        ['Register every resource before creating a document from the template']
      );
    }

    this.validate(item);

    if (this.entries.has(item.id)) {
      this.logger.debug(`[${this.label}] Replacing "${item.id}"`);
    }
    this.entries.set(item.id, item);
    return item;
  }

  /**
   * Hook for subclasses to reject an entry before it is stored
   */
  protected validate(_item: T): void {}

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  values(): T[] {
    return [...this.entries.values()];
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }
}
