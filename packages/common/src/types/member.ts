export interface Member {
  id: string;
  address: string;
  name: string;
  isAdmin: boolean;
  active: boolean;
  createdAt: Date;
}

export interface Recipient {
  address: string;
  name: string;
  isAdmin: boolean;
}

export interface MemberIdentity {
  name: string;
  isAdmin: boolean;
}
