import {
  airKoreaGrade,
  calculateAqi,
  gradeColor,
  gradeFor,
  parseMeasurement,
  regionGrade,
  usAqiToKorean,
} from './air-quality.utils';

describe('air quality utils', () => {
  it.each([
    ['pm10', 30, '좋음'],
    ['pm10', 31, '보통'],
    ['pm10', 150, '나쁨'],
    ['pm10', 151, '매우나쁨'],
    ['pm25', 15, '좋음'],
    ['pm25', 16, '보통'],
    ['o3', 0.03, '좋음'],
    ['o3', 0.031, '보통'],
    ['co', 15, '나쁨'],
    ['co', 15.1, '매우나쁨'],
  ] as const)('grades %s %d as %s', (pollutant, value, grade) => {
    expect(gradeFor(pollutant, value)).toBe(grade);
  });

  it('combines pm10 and doubled pm25 into the index', () => {
    expect(calculateAqi(45, 25)).toEqual({ value: 50, grade: '보통', color: '#FFFF00' });
    expect(calculateAqi(20, 10.6)).toEqual({ value: 21, grade: '좋음', color: '#00E400' });
    expect(calculateAqi(100, 80)).toEqual({ value: 160, grade: '매우나쁨', color: '#FF0000' });
  });

  it('converts US EPA values to Korean grades', () => {
    expect(usAqiToKorean(50)).toBe('좋음');
    expect(usAqiToKorean(100)).toBe('보통');
    expect(usAqiToKorean(101)).toBe('나쁨');
    expect(usAqiToKorean(151)).toBe('매우나쁨');
  });

  it('maps AirKorea grade codes and grades blank codes from the value', () => {
    expect(airKoreaGrade('3', 'pm10', 10)).toBe('나쁨');
    expect(airKoreaGrade('', 'pm10', 90)).toBe('나쁨');
    expect(airKoreaGrade(undefined, 'pm25', 10)).toBe('좋음');
    expect(airKoreaGrade('9', 'pm25', 40)).toBe('나쁨');
  });

  it('falls back to the 보통 colour for unknown grades', () => {
    expect(gradeColor('나쁨')).toBe('#FF7E00');
    expect(gradeColor('unknown')).toBe('#FFFF00');
  });

  it('reads missing measurements as zero', () => {
    expect(parseMeasurement('-')).toBe(0);
    expect(parseMeasurement('0.021')).toBe(0.021);
  });

  it('extracts a region grade from a forecast grade list', () => {
    expect(regionGrade('서울 : 보통,제주 : 좋음', '제주')).toBe('좋음');
    expect(regionGrade('서울 : 보통', '부산')).toBeNull();
  });
});
