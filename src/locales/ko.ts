import { type Translations } from "./en.js";

export const ko: Translations = {
  // shell.ts — printWelcome
  welcome_subtitle: " — AI 셸",
  welcome_hint:     "'help'로 명령어 목록을, 'exit'로 종료합니다.",
  // shell.ts — initialize
  ai_initializing:   "AI 엔진 초기화 중...",
  ai_loading_model:  "AI 모델 로드:",
  ai_ready:          "AI 엔진 준비 완료!",
  history_load_failed: "히스토리를 불러올 수 없습니다:",
  // shell.ts — processCommand
  ai_interpretation:        "AI 해석:",
  ai_interpretation_failed: "AI 해석 실패:",
  ai_executing_original:    "원래 명령을 실행합니다...",
  exec_failed:              "명령 실행 오류:",
  // shell.ts — printHelp
  help_header:           "── Obsidian Shell 도움말 ──",
  help_builtins_section: "내장 명령어:",
  help_help:             "도움말 표시",
  help_clear:            "화면 지우기",
  help_history:          "명령 히스토리 표시",
  help_exit:             "Shell 종료",
  help_ai_section:       "AI 기능:",
  help_ai_enabled:       "자연어 명령은 자동으로 해석됩니다",
  help_ai_disabled:      "AI 보조가 꺼져 있어 입력한 그대로 실행됩니다",
  help_examples:         "예시:",
  // shell.ts — printHistory
  history_header: "── 명령 히스토리 ──",
  history_empty:  "(아직 명령이 없습니다)",
  // shell.ts — close
  bye: "안녕히 가세요.",
  // cli.ts — config
  config_header:       "── Obsidian Shell 설정 ──",
  config_ai_enabled:   "AI 사용",
  config_gui_enabled:  "GUI 사용",
  config_history_path: "히스토리 경로",
  config_model_path:   "모델 경로",
  config_api_endpoint: "API 엔드포인트",
  config_max_tokens:   "최대 토큰",
  config_temperature:  "Temperature",
  config_lang:         "언어",
  // cli.ts — update-models
  models_updating:    "AI 모델 업데이트 중...",
  models_downloading: "최신 AI 모델 다운로드 중...",
  models_updated:     "모델 업데이트 완료!",
  // cli.ts — errors
  config_load_failed: "설정을 불러오지 못했습니다:",
};
