import { AirGrade, HealthAdvice, Pollutant } from './interfaces/air-quality.interface';

export const AIRKOREA_BASE_URL = 'http://apis.data.go.kr/B552584';

export const GRADES: readonly AirGrade[] = ['좋음', '보통', '나쁨', '매우나쁨'];

export interface GradeBand {
  // upper limits of 좋음, 보통 and 나쁨; anything above is 매우나쁨
  limits: readonly [number, number, number];
  unit: string;
}

export const GRADE_BANDS: Readonly<Record<Pollutant, GradeBand>> = {
  pm10: { limits: [30, 80, 150], unit: '㎍/㎥' },
  pm25: { limits: [15, 35, 75], unit: '㎍/㎥' },
  o3: { limits: [0.03, 0.09, 0.15], unit: 'ppm' },
  no2: { limits: [0.03, 0.06, 0.2], unit: 'ppm' },
  co: { limits: [2, 9, 15], unit: 'ppm' },
  so2: { limits: [0.02, 0.05, 0.15], unit: 'ppm' },
};

export const AQI_LIMITS: readonly [number, number, number] = [30, 80, 150];

export const US_AQI_LIMITS: readonly [number, number, number] = [50, 100, 150];

export const GRADE_COLORS: Readonly<Record<AirGrade, string>> = {
  좋음: '#00E400',
  보통: '#FFFF00',
  나쁨: '#FF7E00',
  매우나쁨: '#FF0000',
};

export const POLLUTANT_INFO: Readonly<Record<Pollutant, { name: string; unit: string; description: string }>> = {
  pm10: { name: '미세먼지 (PM10)', unit: '㎍/㎥', description: '지름 10마이크로미터 이하의 미세먼지' },
  pm25: { name: '초미세먼지 (PM2.5)', unit: '㎍/㎥', description: '지름 2.5마이크로미터 이하의 초미세먼지' },
  o3: { name: '오존 (O3)', unit: 'ppm', description: '지표면 오존 농도' },
  no2: { name: '이산화질소 (NO2)', unit: 'ppm', description: '이산화질소 농도' },
  co: { name: '일산화탄소 (CO)', unit: 'ppm', description: '일산화탄소 농도' },
  so2: { name: '이산화황 (SO2)', unit: 'ppm', description: '이산화황 농도' },
};

export const GRADE_DESCRIPTIONS: Readonly<Record<AirGrade, string>> = {
  좋음: '대기질이 양호한 상태',
  보통: '대기질이 보통인 상태',
  나쁨: '대기질이 나쁜 상태',
  매우나쁨: '대기질이 매우 나쁜 상태',
};

export const HEALTH_ADVICE: Readonly<Record<AirGrade, HealthAdvice>> = {
  좋음: {
    general: '대기질이 양호합니다. 정상적인 실외활동이 가능합니다.',
    sensitive_groups: '민감군도 정상적인 실외활동이 가능합니다.',
    activities: ['야외운동', '등산', '자전거', '산책'],
    recommendations: ['정상적인 실외활동 권장', '창문 열기 가능'],
  },
  보통: {
    general: '대기질이 보통입니다. 대부분의 사람들에게는 영향이 없습니다.',
    sensitive_groups: '민감군은 장시간 실외활동을 줄이는 것이 좋습니다.',
    activities: ['야외운동', '등산', '자전거', '산책'],
    recommendations: ['정상적인 실외활동 가능', '민감군은 주의'],
  },
  나쁨: {
    general: '대기질이 나쁩니다. 실외활동을 줄이는 것이 좋습니다.',
    sensitive_groups: '민감군은 실외활동을 피해야 합니다.',
    activities: ['가벼운 산책', '짧은 실외활동'],
    recommendations: ['실외활동 줄이기', '마스크 착용 권장', '창문 닫기'],
  },
  매우나쁨: {
    general: '대기질이 매우 나쁩니다. 실외활동을 피해야 합니다.',
    sensitive_groups: '민감군은 실외활동을 금지해야 합니다.',
    activities: ['실내활동만'],
    recommendations: ['실외활동 금지', '마스크 필수', '공기청정기 사용'],
  },
};
