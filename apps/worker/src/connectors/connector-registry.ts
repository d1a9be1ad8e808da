import { NotFoundError } from "@ragsync/errors";
import type { ISourceConnector, SourceService } from "@ragsync/types";

export class ConnectorRegistry {
  private readonly connectors = new Map<SourceService, ISourceConnector>();

  register(connector: ISourceConnector): this {
    this.connectors.set(connector.service, connector);
    return this;
  }

  services(): SourceService[] {
    return [...this.connectors.keys()];
  }

  get(service: SourceService): ISourceConnector {
    const connector = this.connectors.get(service);
    if (!connector) {
      throw new NotFoundError(`No connector registered for service ${service}`, { details: { service } });
    }
    return connector;
  }
}
