export const DEFAULT_RATING = 3.0;
export const PREFERENCE_MATCH_WEIGHT = 1.0;
export const NEARBY_RESULT_LIMIT = 20;

// Current sky condition → destination tags worth suggesting
export const WEATHER_TAGS: Readonly<Record<string, readonly string[]>> = {
  맑음: ['#야외', '#산책', '#공원', '#자연'],
  구름많음: ['#산책', '#경치', '#나들이'],
  흐림: ['#실내', '#카페', '#박물관', '#쇼핑'],
  비: ['#실내', '#박물관', '#미술관', '#아쿠아리움', '#카페'],
  '비/눈': ['#실내', '#카페', '#쇼핑'],
  눈: ['#실내', '#겨울경치', '#스파', '#카페'],
  소나기: ['#실내', '#급방문', '#카페'],
};

export function tagsForWeather(skyCondition: string): string[] {
  return [...(WEATHER_TAGS[skyCondition] ?? [])];
}
