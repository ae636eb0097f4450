// Users Module Exports

export { User } from './user.model.js';
export type { IUser, IUserDocument, IUserModel } from './user.model.js';
