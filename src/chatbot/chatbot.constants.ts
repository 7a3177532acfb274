export const OPENAI_CLIENT = Symbol('OPENAI_CLIENT');

export type ChatIntent = 'weather' | 'travel' | 'greeting' | 'help' | 'general';

export const CHATBOT_CONFIG = {
  welcome_delay: 1000,
  typing_delay: 500,
  max_context_length: 10,
  max_suggestions: 3,
} as const;

// Checked in order; the first list with a hit wins
export const INTENT_KEYWORDS: ReadonlyArray<[ChatIntent, readonly string[]]> = [
  ['weather', ['날씨', '기온', '온도', '비', '눈', '맑음', '흐림', '습도', '바람']],
  ['travel', ['여행', '추천', '관광', '명소', '여행지', '가볼곳', '추천해']],
  ['greeting', ['안녕', '하이', '반가워', '처음', '시작']],
  ['help', ['도움', '도와', '어떻게', '무엇', '뭐']],
];

const GREETING =
  '안녕하세요! 날씨 여행 도우미 챗봇입니다. 날씨 정보와 여행 추천을 도와드릴 수 있어요. 무엇을 도와드릴까요?';

export const INTENT_RESPONSES: Readonly<Record<ChatIntent, string>> = {
  weather:
    '현재 날씨 정보를 확인해드릴게요! 어느 지역의 날씨를 알고 싶으신가요? 도시명이나 지역명을 알려주시면 상세한 날씨 정보를 제공해드립니다.',
  travel:
    '여행지 추천을 도와드릴게요! 어떤 종류의 여행을 계획하고 계신가요? 자연 관광, 문화 체험, 맛집 탐방 등 선호하시는 여행 스타일을 알려주세요.',
  greeting: GREETING,
  help: [
    '다음과 같은 서비스를 이용하실 수 있습니다:',
    '• 실시간 날씨 정보 조회',
    '• 여행지 추천 및 계획',
    '• 지역별 관광 정보',
    '• 여행 일정 관리',
    '',
    '어떤 서비스에 대해 궁금하신가요?',
  ].join('\n'),
  general:
    "죄송합니다. 질문을 정확히 이해하지 못했어요. 날씨 정보나 여행 추천에 대해 물어보시거나, '도움말'이라고 말씀해주시면 더 자세히 안내해드릴게요.",
};

const DEFAULT_SUGGESTIONS = ['날씨 정보를 알려주세요', '여행지를 추천해주세요', '도움말을 보여주세요'];

export const INTENT_SUGGESTIONS: Readonly<Record<ChatIntent, readonly string[]>> = {
  weather: ['서울 날씨는 어때요?', '부산 날씨 알려주세요', '주말 날씨는 어떨까요?'],
  travel: ['자연 관광지 추천해주세요', '문화재 관람 추천', '맛집이 많은 여행지는?'],
  greeting: ['오늘 날씨 어때요?', '여행지 추천해주세요', '도움말을 보여주세요'],
  help: DEFAULT_SUGGESTIONS,
  general: DEFAULT_SUGGESTIONS,
};

export const INITIAL_MESSAGE = {
  message: GREETING,
  suggestions: INTENT_SUGGESTIONS.greeting,
} as const;

export const SYSTEM_PROMPT = [
  '당신은 한국 여행과 날씨 정보를 안내하는 친절한 여행 도우미입니다.',
  '여행지, 여행 일정, 날씨, 대기질, 지역 축제에 관한 질문에만 답하세요.',
  '그 밖의 주제는 정중하게 거절하고 여행이나 날씨 관련 질문을 유도하세요.',
  '답변은 한국어로 간결하게 작성하세요.',
].join('\n');
