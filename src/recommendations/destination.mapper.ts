import { Destination } from './schemas/destination.schema';

export interface DestinationResponse {
  id: string;
  name: string;
  province: string;
  region: string | null;
  category: string | null;
  tags: string[];
  latitude: number | null;
  longitude: number | null;
  rating: number | null;
  popularity_score: number;
  image_url: string | null;
  description: string | null;
  is_indoor: boolean;
  status: string;
  created_at: string | null;
}

export function toDestinationResponse(destination: Destination): DestinationResponse {
  return {
    id: destination._id.toString(),
    name: destination.name,
    province: destination.province,
    region: destination.region ?? null,
    category: destination.category ?? null,
    tags: destination.tags,
    latitude: destination.latitude ?? null,
    longitude: destination.longitude ?? null,
    rating: destination.rating ?? null,
    popularity_score: destination.popularityScore,
    image_url: destination.imageUrl ?? null,
    description: destination.description ?? null,
    is_indoor: destination.isIndoor,
    status: destination.status,
    created_at: destination.createdAt?.toISOString() ?? null,
  };
}
