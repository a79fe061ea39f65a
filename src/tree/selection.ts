import type { NodeSelection } from '../core/collaborators';

export class CurrentNodeRef implements NodeSelection {
  private id: string | undefined;

  get(): string | undefined {
    return this.id;
  }

  set(id: string) {
    this.id = id;
  }

  clear() {
    this.id = undefined;
  }
}
