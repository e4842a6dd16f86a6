export const UNKNOWN_AUTHOR = "Unknown Author";
export const NOT_AVAILABLE = "N/A";
export const MAX_PAGE_SIZE = 100;

/** One normalized top-level comment. Keys match the exported JSON files. */
export interface CommentRecord {
  comment_id: string | null;
  author: string;
  published_at: string | null;
  updated_at: string | null;
  comment_text: string;
  like_count: number;
}

export interface RawCommentSnippet {
  authorDisplayName?: string;
  textDisplay?: string;
  textOriginal?: string;
  publishedAt?: string;
  updatedAt?: string;
  likeCount?: number;
}

export interface RawCommentThread {
  id?: string;
  snippet?: {
    videoId?: string;
    topLevelComment?: {
      id?: string;
      snippet?: RawCommentSnippet;
    };
    totalReplyCount?: number;
  };
}

export type CommentTextFormat = "plainText" | "html";

export interface CommentThreadPageRequest {
  videoId: string;
  pageToken: string | null;
  maxResults: number;
  textFormat: CommentTextFormat;
}

export interface CommentThreadPage {
  items: RawCommentThread[];
  nextPageToken?: string;
}

export interface CommentThreadProvider {
  listCommentThreads(request: CommentThreadPageRequest): Promise<CommentThreadPage>;
}

export type VideoPart = "snippet" | "statistics";

export interface RawVideo {
  id?: string;
  snippet?: {
    title?: string;
    channelTitle?: string;
  };
  statistics?: {
    viewCount?: string;
    likeCount?: string;
    commentCount?: string;
  };
}

export interface VideoDetailsRequest {
  videoId: string;
  parts: VideoPart[];
}

export interface VideoDetailsProvider {
  getVideo(request: VideoDetailsRequest): Promise<RawVideo | null>;
}

export interface VideoSearchResult {
  id: string;
  title: string;
  channel: string | null;
  thumbnail: string | null;
}

export interface VideoSearchProvider {
  searchVideos(query: string, maxResults: number): Promise<VideoSearchResult[]>;
}

export type StatisticValue = number | typeof NOT_AVAILABLE;

/** `null` statistics were not requested; `"N/A"` ones were requested but hidden. */
export interface VideoSummary {
  videoId: string;
  title: string;
  views: StatisticValue | null;
  likes: StatisticValue | null;
}

export type CollectionWarning =
  | { kind: "comments_disabled"; pageNumber: number; message: string }
  | { kind: "provider_error"; pageNumber: number; message: string; status: number | null; reason: string | null }
  | { kind: "cancelled"; pageNumber: number; message: string };

export interface DateParseWarning {
  commentId: string | null;
  value: string | null;
  message: string;
}

export interface AnalysisOptions {
  fetchViews: boolean;
  fetchLikes: boolean;
  fetchComments: boolean;
  startDate: string | null;
  endDate: string | null;
}

export type AnalysisFailure =
  | { kind: "video_not_found"; videoId: string; message: string }
  | { kind: "api_error"; videoId: string; message: string; status: number | null; reason: string | null };

export interface AnalysisSuccess {
  status: "ok";
  video: VideoSummary;
  comments: CommentRecord[];
  fetchedCount: number;
  pagesFetched: number;
  collectionWarning: CollectionWarning | null;
  dateWarnings: DateParseWarning[];
}

export interface AnalysisFailed {
  status: "failed";
  failure: AnalysisFailure;
}

export type AnalysisResult = AnalysisSuccess | AnalysisFailed;
