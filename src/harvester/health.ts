export interface HealthSnapshot {
  startTime: number;
  analysesTotal: number;
  failedAnalysesTotal: number;
  searchesTotal: number;
  activeVideos: Set<string>;
  lastAnalyzedAt: number | null;
}

export function createHealthSnapshot(): HealthSnapshot {
  return {
    startTime: Date.now(),
    analysesTotal: 0,
    failedAnalysesTotal: 0,
    searchesTotal: 0,
    activeVideos: new Set(),
    lastAnalyzedAt: null,
  };
}

export function updateHealthOnStart(snapshot: HealthSnapshot, videoId: string): void {
  snapshot.activeVideos.add(videoId);
}

export function updateHealthOnFinish(snapshot: HealthSnapshot, videoId: string, success: boolean): void {
  snapshot.activeVideos.delete(videoId);
  snapshot.lastAnalyzedAt = Date.now();
  snapshot.analysesTotal += 1;
  if (!success) {
    snapshot.failedAnalysesTotal += 1;
  }
}

export function buildHealthPayload(snapshot: HealthSnapshot, cachedAnalyses: number) {
  return {
    status: "ok" as const,
    uptimeSeconds: Math.round((Date.now() - snapshot.startTime) / 1000),
    analyses: snapshot.analysesTotal,
    failedAnalyses: snapshot.failedAnalysesTotal,
    searches: snapshot.searchesTotal,
    activeVideos: Array.from(snapshot.activeVideos),
    cachedAnalyses,
    lastAnalyzedAt: snapshot.lastAnalyzedAt === null ? null : new Date(snapshot.lastAnalyzedAt).toISOString(),
  };
}
