import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type TravelPlanCommentDocument = HydratedDocument<TravelPlanComment>;

@Schema({ timestamps: true })
export class TravelPlanComment {
  _id!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlan', required: true, index: true })
  planId!: Types.ObjectId;

  @Prop({ type: Types.ObjectId, ref: 'User', required: true })
  userId!: Types.ObjectId;

  @Prop({ type: String, required: true })
  content!: string;

  @Prop({ type: Types.ObjectId, ref: 'TravelPlanComment', default: null })
  parentCommentId?: Types.ObjectId | null;

  @Prop({ type: Number, default: null })
  dayNumber?: number | null;

  @Prop({ type: Number, default: null })
  placeIndex?: number | null;

  @Prop({ type: Boolean, default: false })
  isEdited!: boolean;

  @Prop({ type: Boolean, default: false })
  isDeleted!: boolean;

  createdAt?: Date;
  updatedAt?: Date;
}

export const TravelPlanCommentSchema = SchemaFactory.createForClass(TravelPlanComment);
