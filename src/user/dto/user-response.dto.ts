import { User } from '../schemas/user.schema';

export interface UserResponseDto {
  id: string;
  email: string;
  nickname: string;
  profile_image: string | null;
  preferences: string[];
  preferred_region: string | null;
  preferred_theme: string | null;
  bio: string | null;
  favorite_cities: string[];
  role: User['role'];
  is_active: boolean;
  last_login: Date | null;
  login_count: number;
  created_at: Date | null;
}

// Never exposes hashedPassword
export function toUserResponse(user: User): UserResponseDto {
  return {
    id: user._id.toString(),
    email: user.email,
    nickname: user.nickname,
    profile_image: user.profileImage ?? null,
    preferences: user.preferences,
    preferred_region: user.preferredRegion ?? null,
    preferred_theme: user.preferredTheme ?? null,
    bio: user.bio ?? null,
    favorite_cities: user.favoriteCities,
    role: user.role,
    is_active: user.isActive,
    last_login: user.lastLogin ?? null,
    login_count: user.loginCount,
    created_at: user.createdAt ?? null,
  };
}
