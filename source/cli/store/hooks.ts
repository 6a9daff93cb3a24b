/**
 * Store hooks typed for the picker store.
 */

import {useDispatch, useSelector} from 'react-redux';
import type {RootState, AppDispatch} from './store.js';

export const useAppDispatch = useDispatch.withTypes<AppDispatch>();

export const useAppSelector = useSelector.withTypes<RootState>();
