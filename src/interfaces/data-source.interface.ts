/**
 * Storefronts whose scraper exports feed the pipeline.
 * The enum values are the provenance tags written to `data_source`.
 */
export enum DataSource {
  STEAM = 'Steam',
  GOG = 'GOG',
  INSTANT_GAMING = 'instant_gaming',
  RAWG = 'RAWG',
  METACRITIC = 'Metacritic',
  HUMBLE = 'Humble',
  EPIC = 'Epic',
}

