export { createReplyRouter } from './reply';
export { createHealthRouter } from './health';
export { createStatsRouter } from './stats';
export { createContactsRouter } from './contacts';
export { createHistoryRouter } from './history';
