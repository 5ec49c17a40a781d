import { log } from "../logger.js";
import type { CityRecord, Repository } from "../repository/types.js";

/**
 * Free-text city lookup over the alias table.
 */
export class CityResolver {
  constructor(private readonly repository: Repository) {}

  /**
   * Exact alias first, then the shortest alias starting with the input
   * (ties go to the alias stored first). Inactive cities never match.
   */
  async resolve(input: string): Promise<CityRecord | null> {
    const query = input.trim();
    if (query === "") return null;

    const exact = await this.repository.findCityByAlias(query);
    if (exact) return exact;

    const [prefixMatch] = await this.repository.findCitiesByPrefix(query, 1);
    if (!prefixMatch) {
      log.city.debug({ query }, "no match");
      return null;
    }
    return prefixMatch;
  }

  async findByCode(code: string): Promise<CityRecord | null> {
    return this.repository.findCityByCode(code);
  }

  /** Active cities with a channel, by name */
  async listAvailable(): Promise<CityRecord[]> {
    return this.repository.listAvailableCities();
  }
}

export function hasChannel(city: CityRecord): city is CityRecord & { channelUrl: string } {
  return city.channelUrl !== null && city.channelUrl !== "";
}
