export type Confidence = 'high' | 'medium' | 'low';

export type PredefinedHabitType = 'healthyBreakfast' | 'morningJournal' | 'vitamins' | 'skincare' | 'mealPrep';

export interface CustomHabitRequest {
  imageBase64: string;
  habitName: string;
  aiPrompt?: string;
  allowsScreenshots?: boolean;
}

export interface VideoRequest {
  frames: string[];
  habitName: string;
  aiPrompt?: string;
  duration?: number;
}

export interface BedResult {
  is_made: boolean;
  detected_subject: string;
  feedback: string;
}

export interface SunlightResult {
  is_outside: boolean;
  detected_subject: string;
  feedback: string;
}

export interface HydrationResult {
  is_water: boolean;
  detected_subject: string;
  feedback: string;
}

export interface HabitResult {
  is_verified: boolean;
  detected_subject: string;
  feedback: string;
}

export interface VideoResult extends HabitResult {
  detected_action: string;
  confidence: Confidence;
}
