export interface TourApiFestivalItem {
  contentid: string;
  contenttypeid: string;
  title: string;
  addr1?: string;
  addr2?: string;
  eventstartdate?: string;
  eventenddate?: string;
  firstimage?: string;
  mapx?: string;
  mapy?: string;
  areacode?: string;
  tel?: string;
}

export interface TourApiEnvelope<TItem> {
  response?: {
    header?: { resultCode: string; resultMsg: string };
    body?: { items?: { item?: TItem[] } | ''; totalCount?: number };
  };
}

export interface Festival {
  content_id: string;
  content_type_id: string;
  title: string;
  address: string;
  start_date: string;
  end_date: string;
  image: string | null;
  latitude: number | null;
  longitude: number | null;
  area_code: string;
  tel: string;
}

export interface TourApiAttractionItem {
  contentid: string;
  contenttypeid: string;
  title: string;
  addr1?: string;
  addr2?: string;
  firstimage?: string;
  mapx?: string;
  mapy?: string;
  areacode?: string;
  cat3?: string;
  tel?: string;
  // detailCommon1 only
  homepage?: string;
  overview?: string;
  createdtime?: string;
  modifiedtime?: string;
}

export interface Attraction {
  content_id: string;
  name: string;
  category: string | null;
  address: string;
  latitude: number | null;
  longitude: number | null;
  image_url: string | null;
  tel: string;
}

export interface AttractionDetail extends Attraction {
  description: string | null;
  homepage: string | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface AttractionSuggestion {
  description: string;
  place_id: string;
  structured_formatting: { main_text: string; secondary_text: string };
}
