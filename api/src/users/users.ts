export interface UserView {
  username: string;
  displayName: string;
  email: string;
  createdAt: string;
  updatedAt: string;
}

export interface UserRegistration {
  username: string;
  displayName: string;
  email: string;
  password: string;
}

export interface UserUpdate {
  displayName?: string;
  email?: string;
  password?: string;
}
