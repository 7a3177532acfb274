export const TOUR_API_BASE_URL = 'http://apis.data.go.kr/B551011/KorService1';

export const TOUR_API_APP = { MobileOS: 'ETC', MobileApp: 'WeatherTravel', _type: 'json' } as const;

// TourAPI content type for tourist attractions
export const ATTRACTION_CONTENT_TYPE = '12';

export const MIN_SEARCH_LENGTH = 2;

/**
 * Administrative region codes (the first two digits of a legal-dong code)
 * to TourAPI area codes.
 */
export const REGION_TO_TOUR_AREA: Readonly<Record<string, string>> = {
  '11': '1',
  '26': '6',
  '27': '4',
  '28': '2',
  '29': '5',
  '30': '3',
  '31': '7',
  '36': '8',
  '41': '31',
  '42': '31',
  '43': '33',
  '44': '34',
  '46': '36',
  '47': '35',
  '48': '38',
  '50': '39',
  '51': '32',
  '52': '37',
};
