import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { TRAVEL_MODES, TravelMode } from '../../map/map.constants';

export type TravelRouteDocument = HydratedDocument<TravelRoute>;

/**
 * One leg between two stops of a plan. Lives beside the plan schemas so
 * deleting a plan can cascade to its routes.
 */
@Schema({ timestamps: true })
export class TravelRoute {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true, index: true })
  planId!: Types.ObjectId;

  @Prop({ type: String, required: true })
  originPlaceId!: string;

  @Prop({ type: String, required: true })
  destinationPlaceId!: string;

  @Prop({ type: Number, required: true })
  routeOrder!: number;

  @Prop({ type: String, enum: TRAVEL_MODES, required: true })
  transportMode!: TravelMode;

  @Prop({ type: Number, default: null })
  durationMinutes?: number | null;

  @Prop({ type: Number, default: null })
  distanceKm?: number | null;

  @Prop({ type: Object, default: null })
  routeData?: Record<string, unknown> | null;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelRouteSchema = SchemaFactory.createForClass(TravelRoute);

TravelRouteSchema.index({ planId: 1, routeOrder: 1 });
