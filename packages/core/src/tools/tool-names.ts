/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Names are part of the model contract; prompts and stored transcripts refer
// to them.
export const RETRIEVE_INGREDIENT_TOOL_NAME = 'retrieve_ingredient';
export const RETRIEVE_MEAL_TOOL_NAME = 'retrieve_meal';
export const RETRIEVE_MEAL_BY_INSTRUCTIONS_TOOL_NAME =
  'retrieve_meal_by_instructions';
export const LIST_INGREDIENTS_TOOL_NAME = 'list_ingredients';
export const GET_PRICE_TOOL_NAME = 'get_price';
export const ADD_TO_BASKET_TOOL_NAME = 'add_to_basket';
export const LIST_SALE_ITEMS_TOOL_NAME = 'list_sale_items';
export const RETRIEVE_MEALS_WITH_SALE_OVERLAP_TOOL_NAME =
  'retrieve_meals_with_sale_overlap';
export const GET_MEAL_DETAILS_TOOL_NAME = 'get_meal_details';
export const GET_MEAL_INGREDIENTS_TOOL_NAME = 'get_meal_ingredients';
export const GET_INGREDIENT_DETAILS_TOOL_NAME = 'get_ingredient_details';
export const ADD_MEAL_TO_BASKET_TOOL_NAME = 'add_meal_to_basket';
