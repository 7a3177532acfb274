import { BadRequestException, HttpStatus, NotFoundException } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AxiosError } from 'axios';
import { of, throwError } from 'rxjs';
import { KMA_BASE_URL } from './kma.constants';
import { KmaService } from './kma.service';

const envelope = (item: object[], resultCode = '00', resultMsg = 'NORMAL_SERVICE') => ({
  data: {
    response: {
      header: { resultCode, resultMsg },
      body: { items: { item }, totalCount: item.length },
    },
  },
});

describe('KmaService', () => {
  let service: KmaService;
  const httpService = { get: jest.fn() };
  // 08:10 on 2024-05-11 in Seoul
  const now = new Date('2024-05-10T23:10:00Z');

  const createService = async (apiKey: string | undefined): Promise<KmaService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        KmaService,
        { provide: HttpService, useValue: httpService },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => (key === 'KMA_API_KEY' ? apiKey : undefined)) } },
      ],
    }).compile();
    return module.get<KmaService>(KmaService);
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    service = await createService('test-key');
  });

  describe('getCurrentWeather', () => {
    it('requests the ultra short observation for the current base time', async () => {
      httpService.get.mockReturnValue(
        of(
          envelope([
            { category: 'T1H', obsrValue: '18.5' },
            { category: 'REH', obsrValue: '70' },
          ]),
        ),
      );

      const result = await service.getCurrentWeather(60, 127, now);

      expect(httpService.get).toHaveBeenCalledWith(
        `${KMA_BASE_URL}/VilageFcstInfoService_2.0/getUltraSrtNcst`,
        expect.objectContaining({
          params: expect.objectContaining({
            serviceKey: 'test-key',
            dataType: 'JSON',
            base_date: '20240511',
            base_time: '0800',
            nx: 60,
            ny: 127,
          }),
        }),
      );
      expect(result).toMatchObject({
        nx: 60,
        ny: 127,
        temperature: 18.5,
        humidity: 70,
        base_date: '20240511',
        base_time: '0800',
        source: 'KMA',
      });
    });

    it('treats an empty items field as no data', async () => {
      httpService.get.mockReturnValue(
        of({ data: { response: { header: { resultCode: '00', resultMsg: 'OK' }, body: { items: '' } } } }),
      );

      const result = await service.getCurrentWeather(60, 127, now);

      expect(result.temperature).toBe(0);
      expect(result.sky_condition).toBe('맑음');
    });

    it('fails on a non-zero result code', async () => {
      httpService.get.mockReturnValue(of(envelope([], '03', 'NO_DATA')));

      await expect(service.getCurrentWeather(60, 127, now)).rejects.toThrow('기상청 API 오류: NO_DATA');
    });

    it('maps a timeout to 408', async () => {
      httpService.get.mockReturnValue(throwError(() => new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED')));

      await expect(service.getCurrentWeather(60, 127, now)).rejects.toMatchObject({
        status: HttpStatus.REQUEST_TIMEOUT,
        code: 'EXTERNAL_API_ERROR',
      });
    });

    it('maps a missing response header to 502', async () => {
      httpService.get.mockReturnValue(of({ data: {} }));

      await expect(service.getCurrentWeather(60, 127, now)).rejects.toMatchObject({
        status: HttpStatus.BAD_GATEWAY,
      });
    });

    it('reports 503 without calling KMA when no key is configured', async () => {
      const unconfigured = await createService(undefined);

      await expect(unconfigured.getCurrentWeather(60, 127, now)).rejects.toMatchObject({
        status: HttpStatus.SERVICE_UNAVAILABLE,
      });
      expect(httpService.get).not.toHaveBeenCalled();
    });
  });

  describe('getMidForecast', () => {
    it('keeps only entries with a rainfall probability', async () => {
      httpService.get.mockReturnValue(
        of(
          envelope([
            { tmFc: '202405110600', wfSv: '맑음', rnSt: '20', taMax: '25', taMin: '14' },
            { tmFc: '202405110600', wfSv: '흐림' },
          ]),
        ),
      );

      const result = await service.getMidForecast('11B10101', now);

      expect(httpService.get.mock.calls[0][1].params.tmFc).toBe('202405110600');
      expect(result).toEqual({
        reg_id: '11B10101',
        forecast: [{ date: '20240511', weather: '맑음', rainfall_probability: 20, max_temp: 25, min_temp: 14 }],
      });
    });
  });

  describe('getAllCitiesCurrent', () => {
    it('records per-city failures without failing the batch', async () => {
      httpService.get.mockImplementation((_url: string, config: { params: { nx: number } }) =>
        config.params.nx === 60
          ? of(envelope([{ category: 'T1H', obsrValue: '17.0' }]))
          : throwError(() => new AxiosError('socket hang up', 'ECONNRESET')),
      );

      const results = await service.getAllCitiesCurrent([
        service.getSupportedCity('서울'),
        service.getSupportedCity('부산'),
      ]);

      expect(results).toHaveLength(2);
      expect(results[0]).toMatchObject({ city: '서울', province: '서울특별시', weather: { temperature: 17 } });
      expect(results[1]).toEqual({ city: '부산', province: '부산광역시', error: '기상청 API 서비스 불가' });
    });
  });

  describe('lookups', () => {
    it('rejects unsupported cities', () => {
      expect(() => service.getSupportedCity('런던')).toThrow(BadRequestException);
    });

    it('rejects unsupported provinces', async () => {
      await expect(service.getCurrentByProvince('없는도')).rejects.toThrow(NotFoundException);
    });

    it('lists the provinces of the supported cities', () => {
      expect(service.getProvinces()).toContain('경기도');
      expect(service.getCities()).toHaveLength(14);
    });
  });
});
