export type TradingState =
  | 'ACTIVE'              // 정상: 신규 진입 + 청산
  | 'ENTRIES_SUSPENDED'   // 서킷 브레이커: 신규 진입만 중단
  | 'HALTED';             // 복구 불가 상태: 사이클 중단 (수동 해제)
