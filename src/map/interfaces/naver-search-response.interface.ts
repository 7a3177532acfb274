export interface NaverLocalItem {
  title: string;
  link: string;
  category: string;
  description: string;
  telephone: string;
  address: string;
  roadAddress: string;
  // WGS84 degrees × 10^7, as strings
  mapx: string;
  mapy: string;
}

export interface NaverLocalSearchResponse {
  total: number;
  start: number;
  display: number;
  items: NaverLocalItem[];
}
