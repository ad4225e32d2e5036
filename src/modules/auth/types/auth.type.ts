/** Returned in `data` by POST /auth/login. */
export interface LoginData {
  token: string;
  user_id: number;
  username: string;
  user_img: string;
}
