import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export const PLAN_STATUSES = ['PLANNING', 'CONFIRMED', 'IN_PROGRESS', 'COMPLETED', 'CANCELLED'] as const;
export type PlanStatus = (typeof PLAN_STATUSES)[number];

export const PLAN_TYPES = ['manual', 'custom'] as const;
export type PlanType = (typeof PLAN_TYPES)[number];

export type TravelPlanDocument = HydratedDocument<TravelPlan>;

@Schema({ timestamps: true })
export class TravelPlan {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true, index: true })
  userId!: Types.ObjectId;

  @Prop({ type: String, required: true, trim: true })
  title!: string;

  @Prop({ type: String, default: null })
  description?: string | null;

  @Prop({ type: Date, required: true })
  startDate!: Date;

  @Prop({ type: Date, required: true })
  endDate!: Date;

  @Prop({ type: Number, min: 0, default: null })
  budget?: number | null;

  @Prop({ type: String, enum: PLAN_STATUSES, default: 'PLANNING', index: true })
  status!: PlanStatus;

  // Free-form, keyed by day ("day1", "day2", ...)
  @Prop({ type: Object, default: {} })
  itinerary!: Record<string, unknown>;

  @Prop({ type: Number, default: null })
  participants?: number | null;

  @Prop({ type: String, default: null })
  transportation?: string | null;

  @Prop({ type: String, default: null })
  startLocation?: string | null;

  @Prop({ type: Object, default: null })
  weatherInfo?: Record<string, unknown> | null;

  @Prop({ type: String, enum: PLAN_TYPES, default: 'manual' })
  planType!: PlanType;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanSchema = SchemaFactory.createForClass(TravelPlan);

TravelPlanSchema.index({ userId: 1, createdAt: -1 });
