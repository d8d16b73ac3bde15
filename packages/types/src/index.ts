export * from './interfaces/ticket.interfaces';
export * from './interfaces/user.interfaces';
export * from './interfaces/permission.interfaces';
export * from './interfaces/history.interfaces';
