import type { DeployManager } from "./deploy-manager.ts";

export class DeploymentRegistry {
  private managers = new Map<string, DeployManager>();

  register(deployId: string, manager: DeployManager): void {
    this.managers.set(deployId, manager);
  }

  find(deployId: string): DeployManager | undefined {
    return this.managers.get(deployId);
  }

  delete(deployId: string): boolean {
    return this.managers.delete(deployId);
  }

  ids(): string[] {
    return [...this.managers.keys()];
  }
}
