export { SessionRepository } from './SessionRepository.js';
export { HistoryRepository } from './HistoryRepository.js';
export { TicketRepository } from './TicketRepository.js';
export { BoardConfigRepository } from './BoardConfigRepository.js';
export { StatisticsRepository } from './StatisticsRepository.js';
