import { atom } from 'jotai'

export type Screen = 'categories' | 'detail' | 'help'

export interface ScreenParams {
  category?: string
}

export const currentScreenAtom = atom<Screen>('categories')
export const screenParamsAtom = atom<ScreenParams>({})

// Navigation actions
export const navigateAtom = atom(null, (_get, set, screen: Screen, params: ScreenParams = {}) => {
  set(currentScreenAtom, screen)
  set(screenParamsAtom, params)
})

export const goBackAtom = atom(null, (_get, set) => {
  set(currentScreenAtom, 'categories')
  set(screenParamsAtom, {})
})
