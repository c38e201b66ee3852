import { DemandSource } from "../../demand/src/demand-source.js";
import { PriceCatalog } from "../../catalog/src/price-catalog.js";
import { mergeDemandSources, type ConsolidatedList } from "../../aggregate/src/merge.js";
import {
  compareCatalogs,
  findCheapestCatalog,
  type CheapestOptions,
  type CheapestResult,
  type Comparison,
} from "../../evaluate/src/compare.js";

/**
 * Registration front for presentation layers.
 * Registration order is the tie-break order for `getCheapest`.
 * Every getter recomputes from the registered sources and catalogs.
 */
export class SupplyPlanner {
  private readonly sources: DemandSource[] = [];
  private readonly catalogs: PriceCatalog[] = [];

  registerDemandSource(source: DemandSource): void {
    this.sources.push(source);
  }

  registerPriceCatalog(catalog: PriceCatalog): void {
    this.catalogs.push(catalog);
  }

  listDemandSources(): ReadonlyArray<DemandSource> {
    return [...this.sources];
  }

  listPriceCatalogs(): ReadonlyArray<PriceCatalog> {
    return [...this.catalogs];
  }

  getConsolidatedList(): ConsolidatedList {
    return mergeDemandSources(this.sources);
  }

  getComparison(): Comparison {
    return compareCatalogs(this.getConsolidatedList(), this.catalogs);
  }

  getCheapest(opts?: CheapestOptions): CheapestResult {
    return findCheapestCatalog(this.getConsolidatedList(), this.catalogs, opts);
  }
}
