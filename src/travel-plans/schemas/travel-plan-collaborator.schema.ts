import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';
import { SHARE_PERMISSIONS, SharePermission } from './travel-plan-share.schema';

export type TravelPlanCollaboratorDocument = HydratedDocument<TravelPlanCollaborator>;

@Schema({ timestamps: true })
export class TravelPlanCollaborator {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true })
  planId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true, index: true })
  userId!: Types.ObjectId;

  @Prop({ type: String, enum: SHARE_PERMISSIONS, default: 'edit' })
  permission!: SharePermission;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true })
  invitedBy!: Types.ObjectId;

  @Prop({ type: Date, default: null })
  lastViewedAt?: Date | null;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanCollaboratorSchema = SchemaFactory.createForClass(TravelPlanCollaborator);

TravelPlanCollaboratorSchema.index({ planId: 1, userId: 1 }, { unique: true });
