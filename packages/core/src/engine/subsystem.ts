/**
 * Subsystem interface and lifecycle registry.
 *
 * Long-lived services such as the asset manager implement this interface so
 * a host can drive them uniformly from its update loop.
 */

export interface Subsystem {
  /** Unique subsystem name. */
  readonly name: string;
  /** Initialize subsystem resources. */
  init(): Promise<void> | void;
  /** Per-tick update step, polled by the host. */
  update(dt: number): void;
  /** Drop transient state without tearing the subsystem down. */
  reset(): void;
  /** Release resources. */
  dispose(): void;
}

export class SubsystemRegistry {
  private readonly subsystems = new Map<string, Subsystem>();
  private readonly updateOrder: Subsystem[] = [];

  register(subsystem: Subsystem): void {
    if (this.subsystems.has(subsystem.name)) {
      throw new Error(`Subsystem "${subsystem.name}" already registered`);
    }
    this.subsystems.set(subsystem.name, subsystem);
    this.updateOrder.push(subsystem);
  }

  get(name: string): Subsystem {
    const subsystem = this.subsystems.get(name);
    if (!subsystem) {
      throw new Error(`Subsystem "${name}" not found`);
    }
    return subsystem;
  }

  has(name: string): boolean {
    return this.subsystems.has(name);
  }

  async initAll(): Promise<void> {
    for (const subsystem of this.updateOrder) {
      await subsystem.init();
    }
  }

  updateAll(dt: number): void {
    for (const subsystem of this.updateOrder) {
      subsystem.update(dt);
    }
  }

  resetAll(): void {
    for (let index = this.updateOrder.length - 1; index >= 0; index -= 1) {
      this.updateOrder[index]?.reset();
    }
  }

  disposeAll(): void {
    // Later subsystems may depend on earlier ones, so tear down in reverse.
    for (let index = this.updateOrder.length - 1; index >= 0; index -= 1) {
      this.updateOrder[index]?.dispose();
    }
    this.subsystems.clear();
    this.updateOrder.length = 0;
  }
}
