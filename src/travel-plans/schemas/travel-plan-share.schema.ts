import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export const SHARE_PERMISSIONS = ['view', 'edit'] as const;
export type SharePermission = (typeof SHARE_PERMISSIONS)[number];

export type TravelPlanShareDocument = HydratedDocument<TravelPlanShare>;

@Schema({ timestamps: true })
export class TravelPlanShare {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true, index: true })
  planId!: Types.ObjectId;

  @Prop({ type: String, required: true, unique: true, index: true })
  shareToken!: string;

  @Prop({ type: String, enum: SHARE_PERMISSIONS, default: 'view' })
  permission!: SharePermission;

  @Prop({ type: Date, default: null })
  expiresAt?: Date | null;

  @Prop({ type: Number, default: null })
  maxUses?: number | null;

  @Prop({ type: Number, default: 0 })
  useCount!: number;

  @Prop({ type: Boolean, default: true })
  isActive!: boolean;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true })
  createdBy!: Types.ObjectId;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanShareSchema = SchemaFactory.createForClass(TravelPlanShare);
