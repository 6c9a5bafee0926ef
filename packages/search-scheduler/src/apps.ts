import type { AppKey, ItemId } from "arr-rotator-commons";

export type SearchCommand =
  | { name: "SeriesSearch"; seriesId: ItemId }
  | { name: "MoviesSearch"; movieIds: ItemId[] }
  | { name: "ArtistSearch"; artistId: ItemId };

export type ArrAppProfile = {
  key: AppKey;
  displayName: string;
  apiPrefix: string;
  itemType: "series" | "movie" | "artist";
  itemsPath: string;
  /** keys under which wanted records reference their parent item */
  wantedIdKeys: readonly string[];
  /** commands that search the picked items; Radarr takes them all at once */
  searchCommands: (ids: ItemId[]) => SearchCommand[];
};

export const ARR_APPS: Record<AppKey, ArrAppProfile> = {
  sonarr: {
    key: "sonarr",
    displayName: "Sonarr",
    apiPrefix: "/api/v3",
    itemType: "series",
    itemsPath: "/series",
    wantedIdKeys: ["seriesId"],
    searchCommands: (ids) => ids.map((seriesId): SearchCommand => ({ name: "SeriesSearch", seriesId })),
  },
  radarr: {
    key: "radarr",
    displayName: "Radarr",
    apiPrefix: "/api/v3",
    itemType: "movie",
    itemsPath: "/movie",
    wantedIdKeys: ["movieId", "movie"],
    searchCommands: (ids) => (ids.length ? [{ name: "MoviesSearch", movieIds: ids }] : []),
  },
  lidarr: {
    key: "lidarr",
    displayName: "Lidarr",
    apiPrefix: "/api/v1",
    itemType: "artist",
    itemsPath: "/artist",
    wantedIdKeys: ["artistId", "artist"],
    searchCommands: (ids) => ids.map((artistId): SearchCommand => ({ name: "ArtistSearch", artistId })),
  },
};
