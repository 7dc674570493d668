export {
  fetchAllReleases,
  filterRecentReleases,
  getRecentReleases,
  RELEASES_PER_PAGE,
  type FetchReleasesOptions,
} from "./releases";
export type { GitHubRelease, GitHubReleaseAuthor } from "./types";
