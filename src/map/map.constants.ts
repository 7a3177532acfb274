export const NAVER_LOCAL_SEARCH_URL = 'https://openapi.naver.com/v1/search/local.json';
export const GOOGLE_MAPS_BASE_URL = 'https://maps.googleapis.com/maps/api';

export const TRAVEL_MODES = ['driving', 'walking', 'transit', 'bicycling'] as const;
export type TravelMode = (typeof TRAVEL_MODES)[number];

// assumed average speeds for straight-line estimates
export const ROUTE_SPEEDS_KMH: Readonly<Record<TravelMode, number>> = {
  driving: 40,
  transit: 25,
  bicycling: 15,
  walking: 4.5,
};

export const NEARBY_QUERIES = {
  restaurants: '맛집',
  hotels: '호텔',
  transportation: '지하철역',
} as const;

export const SEARCH_CATEGORIES = [
  '맛집',
  '카페',
  '호텔',
  '펜션',
  '게스트하우스',
  '모텔',
  '리조트',
  '지하철역',
  '버스정류장',
  '공항',
  '기차역',
  '관광지',
  '쇼핑몰',
  '병원',
  '약국',
  '은행',
  '편의점',
  '주유소',
  '주차장',
] as const;

export const MAP_VIEW_DEFAULTS = { zoom: 15, width: 600, height: 400 } as const;
