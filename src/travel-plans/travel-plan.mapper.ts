import { TravelPlan } from './schemas/travel-plan.schema';
import { TravelPlanCollaborator } from './schemas/travel-plan-collaborator.schema';
import { TravelPlanComment } from './schemas/travel-plan-comment.schema';
import { TravelPlanShare } from './schemas/travel-plan-share.schema';
import { TravelPlanVersion } from './schemas/travel-plan-version.schema';
import { TravelRoute } from './schemas/travel-route.schema';

export function toPlanResponse(plan: TravelPlan) {
  return {
    plan_id: plan._id.toString(),
    user_id: plan.userId.toString(),
    title: plan.title,
    description: plan.description ?? null,
    start_date: plan.startDate,
    end_date: plan.endDate,
    budget: plan.budget ?? null,
    status: plan.status,
    itinerary: plan.itinerary,
    participants: plan.participants ?? null,
    transportation: plan.transportation ?? null,
    start_location: plan.startLocation ?? null,
    weather_info: plan.weatherInfo ?? null,
    plan_type: plan.planType,
    created_at: plan.createdAt ?? null,
    updated_at: plan.updatedAt ?? null,
  };
}

export type PlanResponse = ReturnType<typeof toPlanResponse>;

export function toShareResponse(share: TravelPlanShare, frontendUrl: string) {
  const shareLink = `/shared/${share.shareToken}`;
  return {
    share_id: share._id.toString(),
    plan_id: share.planId.toString(),
    share_token: share.shareToken,
    share_link: shareLink,
    share_url: `${frontendUrl.replace(/\/+$/, '')}${shareLink}`,
    permission: share.permission,
    expires_at: share.expiresAt ?? null,
    max_uses: share.maxUses ?? null,
    use_count: share.useCount,
    is_active: share.isActive,
    created_by: share.createdBy.toString(),
    created_at: share.createdAt ?? null,
  };
}

export function toVersionResponse(version: TravelPlanVersion) {
  return {
    version_id: version._id.toString(),
    plan_id: version.planId.toString(),
    version_number: version.versionNumber,
    title: version.title,
    description: version.description ?? null,
    itinerary: version.itinerary,
    change_description: version.changeDescription ?? null,
    created_by: version.createdBy.toString(),
    created_at: version.createdAt ?? null,
  };
}

export interface CommentResponse {
  comment_id: string;
  plan_id: string;
  user_id: string;
  content: string;
  parent_comment_id: string | null;
  day_number: number | null;
  place_index: number | null;
  is_edited: boolean;
  created_at: Date | null;
  updated_at: Date | null;
  replies: CommentResponse[];
}

export function toCommentResponse(comment: TravelPlanComment): CommentResponse {
  return {
    comment_id: comment._id.toString(),
    plan_id: comment.planId.toString(),
    user_id: comment.userId.toString(),
    content: comment.content,
    parent_comment_id: comment.parentCommentId ? comment.parentCommentId.toString() : null,
    day_number: comment.dayNumber ?? null,
    place_index: comment.placeIndex ?? null,
    is_edited: comment.isEdited,
    created_at: comment.createdAt ?? null,
    updated_at: comment.updatedAt ?? null,
    replies: [],
  };
}

export function toCollaboratorResponse(collaborator: TravelPlanCollaborator) {
  return {
    collaborator_id: collaborator._id.toString(),
    plan_id: collaborator.planId.toString(),
    user_id: collaborator.userId.toString(),
    permission: collaborator.permission,
    invited_by: collaborator.invitedBy.toString(),
    last_viewed_at: collaborator.lastViewedAt ?? null,
    created_at: collaborator.createdAt ?? null,
  };
}

export function toRouteResponse(route: TravelRoute) {
  return {
    route_id: route._id.toString(),
    plan_id: route.planId.toString(),
    origin_place_id: route.originPlaceId,
    destination_place_id: route.destinationPlaceId,
    route_order: route.routeOrder,
    transport_mode: route.transportMode,
    duration_minutes: route.durationMinutes ?? null,
    distance_km: route.distanceKm ?? null,
    route_data: route.routeData ?? null,
    created_at: route.createdAt ?? null,
  };
}
