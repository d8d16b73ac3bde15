export interface IUser {
  id: number;
  login: string;
  first_name: string;
  last_name: string;
  valid_id: number;
}
