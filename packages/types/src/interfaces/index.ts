export * from './context.interfaces';
export * from './project.interfaces';
export * from './team.interfaces';
export * from './ticket.interfaces';
export * from './user.interfaces';
