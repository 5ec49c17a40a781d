/**
 * Shared fixtures: an in-memory PGlite repository seeded with a small city set.
 */

import type { SeedCity } from "@nestfinder/db";
import { PgliteRepository } from "../src/repository/pglite.js";

export const TEST_CITIES: SeedCity[] = [
  { code: "kyiv", nameUk: "Київ", channelUrl: "https://t.me/test_kyiv", aliases: ["Київ", "киев", "kyiv", "кв"] },
  { code: "lviv", nameUk: "Львів", channelUrl: "https://t.me/test_lviv", aliases: ["львів", "lviv"] },
  { code: "mykolaiv", nameUk: "Миколаїв", channelUrl: "https://t.me/test_mykolaiv", aliases: ["миколаїв"] },
  { code: "myrhorod", nameUk: "Миргород", channelUrl: "https://t.me/test_myrhorod", aliases: ["миргород"] },
  { code: "uzhhorod", nameUk: "Ужгород", channelUrl: null, aliases: ["ужгород"] },
  { code: "chernihiv", nameUk: "Чернігів", channelUrl: null, aliases: ["чернігів"] },
];

export async function openTestRepository(seed: SeedCity[] = TEST_CITIES): Promise<PgliteRepository> {
  const repository = PgliteRepository.open("memory://");
  await repository.bootstrap();
  await repository.seedCities(seed);
  return repository;
}

/** Register `count` users with tg ids starting at `firstTgId` */
export async function addUsers(repository: PgliteRepository, firstTgId: number, count: number): Promise<number[]> {
  const ids: number[] = [];
  for (let i = 0; i < count; i++) {
    const tgId = firstTgId + i;
    await repository.saveUser({ tgId, username: `user${tgId}`, firstName: `User ${tgId}` });
    ids.push(tgId);
  }
  return ids;
}
