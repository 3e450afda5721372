/** The slice of a user record the session core reads. */
export interface UserAccount {
  id: string;
  username: string;
  email: string;
  fullName: string | null;
  isActive: boolean;
  isAdmin: boolean;
}
