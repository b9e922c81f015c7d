/**
 * A user is one aggregate with optional capability profiles attached.
 * Capabilities are checked by presence of the profile, never inferred.
 */
export type UserProfiles = {
  shop?: { id: string; name: string };
  fishSeller?: { id: string; businessName: string };
  jobWorker?: { id: string };
};

export type UserAggregate = {
  id: string;
  phone: string;
  name: string | null;
  profiles: UserProfiles;
};

export type ProfileKind = keyof UserProfiles;

export function hasProfile(user: UserAggregate | null, kind: ProfileKind): boolean {
  return user?.profiles[kind] != null;
}

export interface UserRepository {
  findById(id: string): Promise<UserAggregate | null>;
  findByPhone(phone: string): Promise<UserAggregate | null>;
  /** Creates a plain customer for the phone, or returns the existing user. */
  ensureCustomer(phone: string): Promise<UserAggregate>;
  /**
   * Attaches a fish-seller profile. `created` is false when the user already
   * had one; the existing profile is kept as it was.
   */
  registerFishSeller(
    userId: string,
    input: FishSellerInput
  ): Promise<{ user: UserAggregate; created: boolean }>;
}

export type FishSellerInput = {
  businessName: string;
  latitude: number;
  longitude: number;
};
