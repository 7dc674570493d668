// GitHub REST API Types

export interface GitHubReleaseAuthor {
  login: string;
  id: number;
}

export interface GitHubRelease {
  id: number;
  tag_name: string;
  name: string | null;
  body: string | null;
  html_url: string;
  draft: boolean;
  prerelease: boolean;
  created_at: string;
  published_at: string | null;
  author: GitHubReleaseAuthor | null;
}

export interface GitHubErrorBody {
  message?: string;
  documentation_url?: string;
}
