import { BadRequestException, HttpStatus, Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { ExternalApiException, ResourceNotFoundException } from '../common/exceptions/app.exception';
import { seoulDateString, seoulTimestampToIso } from '../common/utils/date.util';
import { errorMessage, HTTP_TIMEOUT_MS } from '../common/utils/http-error.util';
import { getAreaCode } from '../kma/kma.utils';
import {
  Attraction,
  AttractionDetail,
  AttractionSuggestion,
  Festival,
  TourApiAttractionItem,
  TourApiEnvelope,
  TourApiFestivalItem,
} from './interfaces/tour-api.interface';
import {
  ATTRACTION_CONTENT_TYPE,
  MIN_SEARCH_LENGTH,
  REGION_TO_TOUR_AREA,
  TOUR_API_APP,
  TOUR_API_BASE_URL,
} from './tourism.constants';

export interface RegionAttractions {
  attractions: Attraction[];
  total: number;
  region_code: string;
  tour_api_area_code: string;
}

@Injectable()
export class TourismService {
  private readonly logger = new Logger(TourismService.name);
  private readonly apiKey: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.apiKey = this.configService.get<string>('KOREA_TOURISM_API_KEY') || '';
    if (!this.apiKey) {
      this.logger.warn('Missing KOREA_TOURISM_API_KEY in environment variables');
    }
  }

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /**
   * Accepts a numeric TourAPI area code or a Korean city/province name.
   */
  resolveAreaCode(area: string): string {
    if (/^\d+$/.test(area)) {
      return area;
    }
    const code = getAreaCode(area);
    if (!code) {
      throw new BadRequestException(`알 수 없는 지역입니다: ${area}`);
    }
    return code;
  }

  /**
   * Administrative region codes ("11", "11000000") map onto TourAPI area codes;
   * unmapped numbers pass through and names go through the area table.
   */
  toTourAreaCode(regionCode: string): string {
    if (!/^\d+$/.test(regionCode)) {
      return this.resolveAreaCode(regionCode);
    }
    return REGION_TO_TOUR_AREA[regionCode.slice(0, 2)] ?? regionCode;
  }

  async getFestivals(area: string, startDate?: string, now: Date = new Date()): Promise<Festival[]> {
    const areaCode = this.resolveAreaCode(area);
    if (!this.isConfigured) {
      return [];
    }

    try {
      const items = await this.request<TourApiFestivalItem>('searchFestival1', {
        arrange: 'A',
        numOfRows: 100,
        pageNo: 1,
        listYN: 'Y',
        areaCode,
        eventStartDate: startDate ?? seoulDateString(now),
      });
      return items.map(toFestival);
    } catch (error) {
      if (error instanceof ExternalApiException) {
        return [];
      }
      throw error;
    }
  }

  /**
   * Autocomplete over attraction names. Queries shorter than two characters
   * answer an empty list without calling TourAPI.
   */
  async searchAttractions(query: string, limit = 10): Promise<AttractionSuggestion[]> {
    const keyword = query.trim();
    if (keyword.length < MIN_SEARCH_LENGTH) {
      return [];
    }
    const items = await this.request<TourApiAttractionItem>('searchKeyword1', {
      keyword,
      contentTypeId: ATTRACTION_CONTENT_TYPE,
      arrange: 'A',
      listYN: 'Y',
      numOfRows: limit,
      pageNo: 1,
    });
    return items.map((item) => ({
      description: item.title,
      place_id: item.contentid,
      structured_formatting: { main_text: item.title, secondary_text: joinAddress(item) },
    }));
  }

  async getAttractionsByRegion(regionCode: string, limit = 100): Promise<RegionAttractions> {
    const areaCode = this.toTourAreaCode(regionCode);
    const items = await this.request<TourApiAttractionItem>('areaBasedList1', {
      areaCode,
      contentTypeId: ATTRACTION_CONTENT_TYPE,
      arrange: 'A',
      listYN: 'Y',
      numOfRows: limit,
      pageNo: 1,
    });
    const attractions = items.map(toAttraction);
    return { attractions, total: attractions.length, region_code: regionCode, tour_api_area_code: areaCode };
  }

  async getAttraction(contentId: string): Promise<AttractionDetail> {
    const [item] = await this.request<TourApiAttractionItem>('detailCommon1', {
      contentId,
      defaultYN: 'Y',
      firstImageYN: 'Y',
      addrinfoYN: 'Y',
      mapinfoYN: 'Y',
      overviewYN: 'Y',
    });
    if (!item) {
      throw new ResourceNotFoundException('관광지를 찾을 수 없습니다.');
    }
    return {
      ...toAttraction(item),
      description: item.overview || null,
      homepage: extractHomepage(item.homepage),
      created_at: seoulTimestampToIso(item.createdtime),
      updated_at: seoulTimestampToIso(item.modifiedtime),
    };
  }

  private async request<TItem>(operation: string, params: Record<string, string | number>): Promise<TItem[]> {
    if (!this.isConfigured) {
      throw new ExternalApiException('관광 정보 API 키가 설정되지 않았습니다.', HttpStatus.SERVICE_UNAVAILABLE, 'tourapi');
    }

    let data: TourApiEnvelope<TItem>;
    try {
      const response = await firstValueFrom(
        this.httpService.get<TourApiEnvelope<TItem>>(`${TOUR_API_BASE_URL}/${operation}`, {
          params: { serviceKey: this.apiKey, ...TOUR_API_APP, ...params },
          timeout: HTTP_TIMEOUT_MS,
        }),
      );
      data = response.data;
    } catch (error) {
      this.logger.error(`TourAPI ${operation} failed: ${errorMessage(error)}`);
      throw new ExternalApiException('관광 정보 API 호출에 실패했습니다.', HttpStatus.BAD_GATEWAY, 'tourapi');
    }

    const header = data.response?.header;
    if (header && header.resultCode !== '0000') {
      this.logger.warn(`TourAPI ${operation} returned ${header.resultCode}: ${header.resultMsg}`);
      throw new ExternalApiException(`관광 정보 API 오류: ${header.resultMsg}`, HttpStatus.BAD_GATEWAY, 'tourapi');
    }
    const items = data.response?.body?.items;
    return items ? items.item ?? [] : [];
  }
}

const toCoordinate = (value: string | undefined): number | null => {
  const parsed = Number.parseFloat(value ?? '');
  return Number.isNaN(parsed) ? null : parsed;
};

const joinAddress = (item: { addr1?: string; addr2?: string }): string =>
  [item.addr1, item.addr2].filter((part) => part).join(' ');

// detailCommon1 wraps the homepage in an anchor tag
function extractHomepage(value: string | undefined): string | null {
  if (!value) {
    return null;
  }
  const href = /href="([^"]+)"/.exec(value);
  return href ? href[1] : value;
}

function toFestival(item: TourApiFestivalItem): Festival {
  return {
    content_id: item.contentid,
    content_type_id: item.contenttypeid,
    title: item.title,
    address: joinAddress(item),
    start_date: item.eventstartdate ?? '',
    end_date: item.eventenddate ?? '',
    image: item.firstimage || null,
    latitude: toCoordinate(item.mapy),
    longitude: toCoordinate(item.mapx),
    area_code: item.areacode ?? '',
    tel: item.tel ?? '',
  };
}

function toAttraction(item: TourApiAttractionItem): Attraction {
  return {
    content_id: item.contentid,
    name: item.title,
    category: item.cat3 || null,
    address: joinAddress(item),
    latitude: toCoordinate(item.mapy),
    longitude: toCoordinate(item.mapx),
    image_url: item.firstimage || null,
    tel: item.tel ?? '',
  };
}
